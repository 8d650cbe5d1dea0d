import { z } from 'zod';

export const ItemIdSchema = z.union([z.string(), z.number()]);
export type ItemId = z.infer<typeof ItemIdSchema>;

/** One event description fed to the judge and the statement generator. Extra fields pass through. */
export const DescriptionItemSchema = z.object({
  id: ItemIdSchema,
  description: z.string(),
}).passthrough();
export type DescriptionItem = z.infer<typeof DescriptionItemSchema>;

export const LikelihoodSchema = z.enum(['impossible', 'low', 'medium', 'high']);
export type Likelihood = z.infer<typeof LikelihoodSchema>;

export const LikelihoodResultSchema = z.object({
  id: ItemIdSchema,
  possible_in_2026: z.boolean(),
  likelihood: LikelihoodSchema,
  rationale: z.string(),
});
export type LikelihoodResult = z.infer<typeof LikelihoodResultSchema>;

export const StatementLabelSchema = z.enum(['Highly likely', 'Possible', 'Unlikely', 'Highly unlikely']);
export type StatementLabel = z.infer<typeof StatementLabelSchema>;

export const StatementSuffixSchema = z.enum(['highly_likely', 'possible', 'unlikely', 'highly_unlikely']);
export type StatementSuffix = z.infer<typeof StatementSuffixSchema>;

/** Label → id suffix, in generation order. */
export const LABEL_SUFFIX: Record<StatementLabel, StatementSuffix> = {
  'Highly likely': 'highly_likely',
  Possible: 'possible',
  Unlikely: 'unlikely',
  'Highly unlikely': 'highly_unlikely',
};

export const GeneratedStatementSchema = z.object({
  id: z.string(),
  statement: z.string(),
  label: StatementLabelSchema,
});
export type GeneratedStatement = z.infer<typeof GeneratedStatementSchema>;

export const RagJudgmentSchema = z.object({
  statement: z.string(),
  answer: z.enum(['True', 'False']),
  reasoning: z.string(),
});
export type RagJudgment = z.infer<typeof RagJudgmentSchema>;

/** Count items that fail `schema`. Model output is persisted as returned; this only feeds the summary. */
export function countInvalid(items: unknown[], schema: z.ZodTypeAny): number {
  return items.reduce<number>((n, item) => (schema.safeParse(item).success ? n : n + 1), 0);
}
