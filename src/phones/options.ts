import { z } from 'zod';

export const DEFAULT_MOBILE_LABEL_KEYWORDS = ['mobile', 'cell', 'móvil'];

export const cleanerOptionsSchema = z.object({
  defaultCountryCode: z.string()
    .regex(/^\+\d{1,3}$/, 'must be "+" followed by 1 to 3 digits')
    .default('+1'),
  mexicoMobileDisambiguatorEnabled: z.boolean().default(false),
  mobileLabelKeywords: z.array(z.string().min(1)).default(() => [...DEFAULT_MOBILE_LABEL_KEYWORDS]),
});

export type CleanerOptions = z.infer<typeof cleanerOptionsSchema>;
export type CleanerOptionsInput = z.input<typeof cleanerOptionsSchema>;

export const DEFAULT_CLEANER_OPTIONS: CleanerOptions = cleanerOptionsSchema.parse({});

/** Subset the normalizer and extractor read. */
export type NormalizeOptions = Pick<CleanerOptions, 'defaultCountryCode' | 'mexicoMobileDisambiguatorEnabled'>;
