// Label configuration for the generator and the CLI
// Values come from the environment, with defaults for the Brother P710BT and 12mm tape

import { z } from 'zod';
import { AppError, ErrorCodes } from '@/lib/utils/errors';

export const iconSplitSchema = z.enum(['horizontal', 'vertical']);

const labelConfigSchema = z.object({
  labelWidthMm: z.coerce.number().positive().default(36),
  // Nominally 9mm, but the printer can't print all the way to the edges
  labelHeightMm: z.coerce.number().positive().default(7.7),
  densityDpi: z.coerce.number().int().positive().default(150),
  codeModuleMm: z.coerce.number().positive().default(0.45),
  iconSplit: iconSplitSchema.default('horizontal'),
  shortenerUrl: z.string().url().default('https://v.gd/create.php?format=simple&url='),
  shortenerTimeoutMs: z.coerce.number().int().positive().default(5000),
});

export type LabelConfig = z.infer<typeof labelConfigSchema>;

type Env = Record<string, string | undefined>;

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/**
 * Build the label configuration from environment variables
 */
export function loadLabelConfig(env: Env = process.env): LabelConfig {
  const result = labelConfigSchema.safeParse({
    labelWidthMm: emptyToUndefined(env.LABEL_WIDTH_MM),
    labelHeightMm: emptyToUndefined(env.LABEL_HEIGHT_MM),
    densityDpi: emptyToUndefined(env.LABEL_DENSITY_DPI),
    codeModuleMm: emptyToUndefined(env.LABEL_CODE_MODULE_MM),
    iconSplit: emptyToUndefined(env.LABEL_ICON_SPLIT),
    shortenerUrl: emptyToUndefined(env.LINK_SHORTENER_URL),
    shortenerTimeoutMs: emptyToUndefined(env.LINK_SHORTENER_TIMEOUT_MS),
  });

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new AppError(ErrorCodes.INVALID_INPUT, `Invalid label configuration: ${issues.join('; ')}`, {
      issues,
    });
  }

  return result.data;
}
