import { z } from "zod";
import { E164_PATTERN } from "./constants.js";

const optionalString = z
  .string()
  .nullish()
  .transform((v) => v ?? undefined);

// ============================================================
// Request schemas
// ============================================================

export const PhoneNumberSchema = z
  .string()
  .trim()
  .refine((v) => v.startsWith("+"), (v) => ({ message: `Phone number must start with '+': ${v}` }))
  // Numbers without "+" are already reported above.
  .refine(
    (v) => !v.startsWith("+") || E164_PATTERN.test(v),
    (v) => ({ message: `Phone number is not valid E.164: ${v}` })
  );

export const TestConfigurationSchema = z.object({
  testCaseId: z.string().min(1),
  personaOverride: z.string().min(1).optional(),
  scenarioOverride: z.string().min(1).optional(),
});

export const TestSelectionSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("tags"), tagIds: z.array(z.string().min(1)).min(1) }),
  z.object({
    kind: z.literal("testCases"),
    testConfigurations: z.array(TestConfigurationSchema).min(1),
  }),
]);

export const TestRunRequestSchema = z.object({
  agentId: z.string().trim().min(1, "Agent id is required"),
  phoneNumbers: z.array(PhoneNumberSchema).min(1, "At least one phone number is required"),
  selection: TestSelectionSchema,
});

// ============================================================
// Response schemas
// ============================================================

export const RunStatusSchema = z.string().min(1);

export const TestCaseRunSchema = z.object({
  id: z.string(),
  testCaseId: optionalString,
  status: optionalString,
});

export const TestRunResponseSchema = z.object({
  testRunId: z.string().min(1),
  resultsUrl: z.string(),
  status: RunStatusSchema,
  testCaseRuns: z.array(TestCaseRunSchema).optional(),
});

export const TestRunStatusResponseSchema = z.object({
  status: RunStatusSchema,
});

export const AssertionResultSchema = z.object({
  assertionName: z.string(),
  status: z.string(),
  reason: optionalString,
});

export const CallResultSchema = z.object({
  id: z.string(),
  status: z.string(),
  phoneNumber: z.string(),
  testCaseId: z.string(),
  scores: z.record(z.number()).default({}),
  transcript: optionalString,
  durationMs: z
    .number()
    .nonnegative()
    .nullish()
    .transform((v) => v ?? undefined),
  assertionResults: z
    .array(AssertionResultSchema)
    .nullish()
    .transform((v) => v ?? undefined),
});

export const AssertionCategorySchema = z.object({
  name: z.string(),
  score: z.number(),
});

export const AssertionSummarySchema = z.object({
  overallScore: z.number().min(0).max(1),
  categories: z
    .array(AssertionCategorySchema)
    .nullish()
    .transform((v) => v ?? undefined),
});

export const TestRunResultsSchema = z.object({
  id: z.string().min(1),
  status: RunStatusSchema,
  calls: z.array(CallResultSchema).default([]),
  summary: z
    .object({
      assertions: AssertionSummarySchema.default({ overallScore: 0 }),
    })
    .default({}),
});
