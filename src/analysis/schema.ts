import { z } from "zod";

const LineCountsSchema = z.object({
  total: z.number().int().min(0),
  code: z.number().int().min(0),
  comment: z.number().int().min(0),
  blank: z.number().int().min(0),
});

export const DefinitionSchema = z.object({
  qualifiedName: z.string(),
  name: z.string(),
  kind: z.enum(["function", "class", "method"]),
  startLine: z.number().int().positive(),
  endLine: z.number().int().positive(),
  parameterCount: z.number().int().min(0),
  decorators: z.array(z.string()),
  complexity: z.number().int().min(1),
  maintainability: z.number().min(0).max(100),
  linesOfCode: z.number().int().min(0),
});

export const ImportReferenceSchema = z.object({
  specifier: z.string(),
  kind: z.enum(["static", "re-export", "require", "dynamic", "import-equals"]),
  typeOnly: z.boolean(),
  line: z.number().int().positive(),
});

export const FileAnalysisSchema = z.discriminatedUnion("status", [
  z.object({
    status: z.literal("ok"),
    path: z.string(),
    definitions: z.array(DefinitionSchema),
    imports: z.array(ImportReferenceSchema),
    metrics: z.object({
      lines: LineCountsSchema,
      totalComplexity: z.number().int().min(0),
      maxComplexity: z.number().int().min(0),
      averageMaintainability: z.number().nullable(),
    }),
  }),
  z.object({
    status: z.literal("parse-failed"),
    path: z.string(),
    reason: z.enum(["syntax", "encoding"]),
    message: z.string(),
    definitions: z.tuple([]),
    imports: z.tuple([]),
  }),
]);
