import { z, type ZodError } from "zod";

const blankToUndefined = (value: unknown): unknown =>
  value === null || (typeof value === "string" && value.trim() === "")
    ? undefined
    : value;

const integerMessage = (name: string) => `'${name}' must be an integer`;

// Accepts JSON numbers and decimal digit strings only; booleans and arrays are rejected.
const integerInput = (name: string) => {
  const message = integerMessage(name);
  return z.union(
    [
      z.number().int(message),
      z
        .string()
        .trim()
        .regex(/^[+-]?\d+$/, message)
        .transform(Number),
    ],
    { errorMap: () => ({ message }) },
  );
};

const optionalInteger = (name: string) =>
  z.preprocess(blankToUndefined, integerInput(name).optional());

const optionalMonth = z.preprocess(
  blankToUndefined,
  integerInput("month")
    .pipe(
      z
        .number()
        .min(1, "'month' must be between 1 and 12")
        .max(12, "'month' must be between 1 and 12"),
    )
    .optional(),
);

const optionalText = z.preprocess(blankToUndefined, z.string().optional());

const requiredText = (name: string) =>
  z.preprocess(
    blankToUndefined,
    z.string({
      required_error: `Query parameter '${name}' is required`,
      invalid_type_error: `Query parameter '${name}' must be a single value`,
    }),
  );

export const periodQuerySchema = z.object({
  year: optionalInteger("year"),
  month: optionalMonth,
});

export const companyQuerySchema = periodQuerySchema.extend({
  name: requiredText("name"),
});

export const companyHistoryQuerySchema = z.object({
  name: requiredText("name"),
});

export const rankParamsSchema = z.object({
  rank: integerInput("rank"),
});

export const rankingsQuerySchema = periodQuerySchema.extend({
  limit: optionalInteger("limit"),
  offset: optionalInteger("offset"),
});

export const searchQuerySchema = periodQuerySchema.extend({
  company: requiredText("company"),
  limit: optionalInteger("limit"),
});

export const periodsQuerySchema = z.object({
  industry: optionalText,
});

export const companiesBatchBodySchema = z.object({
  companies: z.array(z.string(), {
    required_error: "Request JSON must include 'companies': [string, ...]",
    invalid_type_error: "Request JSON must include 'companies': [string, ...]",
  }),
  industry: optionalText,
  year: optionalInteger("year"),
  month: optionalMonth,
});

/**
 * Flattens the first zod issue into one line for the error payload.
 */
export const describeValidationError = (error: ZodError): string => {
  const issue = error.issues[0];
  return issue ? issue.message : "Invalid request.";
};
