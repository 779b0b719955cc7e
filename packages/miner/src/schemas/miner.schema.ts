import { z } from 'zod';

export const DEFAULT_RATE_MS = 100;
export const DEFAULT_SEPARATOR = ' ';
// Largest delay setTimeout honours; Node clamps anything above it to 1 ms.
export const MAX_RATE_MS = 2_147_483_647;
// Mantra repeats are expanded into the sequence up front.
export const MAX_MANTRA_REPEATS = 10_000;

const repeatsSchema = z.number().int().min(1).max(MAX_MANTRA_REPEATS);
const passesSchema = z.number().int().min(1);

export const mantraSchema = z.union([
  z.object({
    syllables: z.array(z.string()),
    repeats: repeatsSchema.optional(),
  }).strict(),
  z.object({
    text: z.string(),
    repeats: repeatsSchema.optional(),
  }).strict(),
]);

export const minerOptionsSchema = z.object({
  preparation: z.string().optional(),
  mantra: z.string().optional(),
  mantras: z.array(mantraSchema).optional(),
  conclusion: z.string().optional(),
  repeat: z.union([z.boolean(), passesSchema]).default(false),
  rateMs: z.number().int().min(1).max(MAX_RATE_MS).default(DEFAULT_RATE_MS),
  separator: z.string().default(DEFAULT_SEPARATOR),
}).strict()
  .refine((options) => (options.mantra === undefined) !== (options.mantras === undefined), {
    message: 'Provide exactly one of mantra or mantras',
    path: ['mantras'],
  })
  .transform(({ mantra, mantras, ...rest }) => ({
    ...rest,
    mantras: mantras ?? [{ text: mantra ?? '' }],
  }));

export type MantraDTO = z.infer<typeof mantraSchema>;
export type MinerOptionsInput = z.input<typeof minerOptionsSchema>;
export type MinerOptions = z.output<typeof minerOptionsSchema>;
