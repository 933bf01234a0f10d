/**
 * JSON-stat 2.0 flattening
 *
 * The Eurostat Statistics API answers with a single JSON-stat dataset. It is
 * flattened into one row per non-null cell, carrying each dimension's code
 * and, when the dataset provides one, its label under `<dim>__label`.
 */

import type { RawRow } from "./types.js";

interface FlatDimension {
  id: string;
  codesByPosition: string[];
  labelsByCode: Map<string, string>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readDimension(
  dimensions: Record<string, unknown>,
  id: string,
  size: number
): FlatDimension {
  const dim = dimensions[id];
  if (!isRecord(dim) || !isRecord(dim.category)) {
    throw new Error(`JSON-stat dimension ${id} has no category`);
  }
  const { index, label } = dim.category;

  let codesByPosition: string[];
  if (Array.isArray(index)) {
    codesByPosition = index.map(String);
  } else if (isRecord(index)) {
    const slots: (string | undefined)[] = new Array<string | undefined>(size);
    for (const [code, position] of Object.entries(index)) {
      if (
        typeof position !== "number" ||
        !Number.isInteger(position) ||
        position < 0 ||
        position >= size
      ) {
        throw new Error(`JSON-stat dimension ${id} has an invalid index`);
      }
      slots[position] = code;
    }
    codesByPosition = slots.map((code) => {
      if (code === undefined) {
        throw new Error(`JSON-stat dimension ${id} has gaps in its index`);
      }
      return code;
    });
  } else if (index === undefined && isRecord(label) && size === 1) {
    // Single-category dimensions may omit the index
    codesByPosition = Object.keys(label);
  } else {
    throw new Error(`JSON-stat dimension ${id} has an unsupported index`);
  }

  if (codesByPosition.length !== size) {
    throw new Error(
      `JSON-stat dimension ${id} has ${String(codesByPosition.length)} categories, expected ${String(size)}`
    );
  }

  const labelsByCode = new Map<string, string>();
  if (isRecord(label)) {
    for (const [code, text] of Object.entries(label)) {
      labelsByCode.set(code, String(text));
    }
  }

  return { id, codesByPosition, labelsByCode };
}

function readValues(
  value: unknown,
  totalSize: number
): (string | number | null)[] {
  const toCell = (cell: unknown): string | number | null =>
    typeof cell === "number" || typeof cell === "string" ? cell : null;

  if (Array.isArray(value)) {
    if (value.length !== totalSize) {
      throw new Error("JSON-stat value length does not match dimension sizes");
    }
    return value.map(toCell);
  }
  if (isRecord(value)) {
    // Sparse form: linear index -> value
    const cells = new Array<string | number | null>(totalSize).fill(null);
    for (const [key, cell] of Object.entries(value)) {
      const position = Number(key);
      if (!Number.isInteger(position) || position < 0 || position >= totalSize) {
        throw new Error(`JSON-stat value index ${key} is out of range`);
      }
      cells[position] = toCell(cell);
    }
    return cells;
  }
  throw new Error("JSON-stat dataset has no value");
}

export function flattenJsonStat(dataset: unknown): RawRow[] {
  if (!isRecord(dataset)) {
    throw new Error("JSON-stat payload is not an object");
  }
  const ids = dataset.id;
  const sizes = dataset.size;
  if (
    !Array.isArray(ids) ||
    !Array.isArray(sizes) ||
    ids.length === 0 ||
    ids.length !== sizes.length ||
    !sizes.every((s) => typeof s === "number" && Number.isInteger(s) && s >= 0)
  ) {
    throw new Error("JSON-stat dataset has a missing or invalid id/size");
  }
  const dimensionMap = dataset.dimension;
  if (!isRecord(dimensionMap)) {
    throw new Error("JSON-stat dataset has no dimension object");
  }

  const dimensionSizes = sizes.map(Number);
  const dimensions = ids.map((id, i) =>
    readDimension(dimensionMap, String(id), dimensionSizes[i] ?? 0)
  );
  const totalSize = dimensionSizes.reduce((acc, s) => acc * s, 1);
  const values = readValues(dataset.value, totalSize);

  // Row-major strides: the last dimension varies fastest
  const strides = new Array<number>(dimensionSizes.length).fill(1);
  for (let i = dimensionSizes.length - 2; i >= 0; i--) {
    strides[i] = (strides[i + 1] ?? 1) * (dimensionSizes[i + 1] ?? 1);
  }

  const rows: RawRow[] = [];
  values.forEach((cell, linear) => {
    if (cell === null) {
      return;
    }
    const row: RawRow = {};
    let remaining = linear;
    dimensions.forEach((dim, i) => {
      const stride = strides[i] ?? 1;
      const position = Math.floor(remaining / stride);
      remaining %= stride;
      const code = dim.codesByPosition[position] ?? "";
      row[dim.id] = code;
      const label = dim.labelsByCode.get(code);
      if (label !== undefined) {
        row[`${dim.id}__label`] = label;
      }
    });
    row.value = cell;
    rows.push(row);
  });

  return rows;
}
