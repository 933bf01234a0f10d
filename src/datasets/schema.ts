/**
 * TypeBox schema for the dataset configuration file
 */

import { Type, type Static } from "@sinclair/typebox";

const NonEmpty = Type.String({ minLength: 1 });

export const AgeDimensionSchema = Type.Union([
  Type.Object({ field: NonEmpty }, { additionalProperties: false }),
  Type.Object(
    { minField: NonEmpty, maxField: NonEmpty },
    { additionalProperties: false }
  ),
]);

export const DimensionMappingSchema = Type.Object(
  {
    geography: NonEmpty,
    geographyLabel: Type.Optional(NonEmpty),
    time: NonEmpty,
    sex: Type.Optional(NonEmpty),
    age: Type.Optional(AgeDimensionSchema),
    industry: Type.Optional(NonEmpty),
    unit: Type.Optional(NonEmpty),
  },
  { additionalProperties: false }
);

export const PagingSchema = Type.Object(
  {
    pageParam: NonEmpty,
    firstPage: Type.Optional(Type.Integer({ minimum: 0 })),
    sizeParam: Type.Optional(NonEmpty),
    pageSize: Type.Optional(Type.Integer({ minimum: 1 })),
    maxPages: Type.Optional(Type.Integer({ minimum: 1 })),
  },
  { additionalProperties: false }
);

export const DatasetConfigSchema = Type.Object(
  {
    id: Type.String({ pattern: "^[A-Za-z0-9_.-]+$" }),
    name: NonEmpty,
    family: Type.Union([
      Type.Literal("demographic"),
      Type.Literal("industrial"),
      Type.Literal("energy"),
    ]),
    format: Type.Union([
      Type.Literal("jsonstat"),
      Type.Literal("json"),
      Type.Literal("csv"),
    ]),
    path: Type.Optional(NonEmpty),
    baseUrl: Type.Optional(NonEmpty),
    dimensions: DimensionMappingSchema,
    defaultParams: Type.Optional(Type.Record(Type.String(), Type.String())),
    valueField: Type.Optional(NonEmpty),
    measure: NonEmpty,
    paging: Type.Optional(PagingSchema),
    recordsField: Type.Optional(NonEmpty),
    nextField: Type.Optional(NonEmpty),
    delimiter: Type.Optional(Type.String({ minLength: 1, maxLength: 1 })),
  },
  { additionalProperties: false }
);

export type DatasetConfig = Static<typeof DatasetConfigSchema>;

export const DatasetsFileSchema = Type.Object({
  datasets: Type.Array(DatasetConfigSchema),
});

export type DatasetsFile = Static<typeof DatasetsFileSchema>;
