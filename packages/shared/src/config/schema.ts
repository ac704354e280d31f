import { z } from 'zod';

export const CHECKSUM_KINDS = ['MD5', 'SHA1', 'SHA256', 'SHA512'] as const;

export const ChecksumKindSchema = z.enum(CHECKSUM_KINDS);
export type ChecksumKind = z.infer<typeof ChecksumKindSchema>;

export const ScanRequestSchema = z.object({
  basePath: z.string().min(1, 'basePath must not be empty'),
  excludeGlob: z.string().default(''),
  matchGlob: z.string().min(1, 'matchGlob must not be empty').default('*'),
  recurse: z.boolean().default(false),
});

/** A scan request after defaults have been applied. */
export type ScanRequest = z.infer<typeof ScanRequestSchema>;
/** A scan request as callers write it; optional fields take their defaults. */
export type ScanRequestInput = z.input<typeof ScanRequestSchema>;

export const ScanProfileSchema = z.object({
  scan: ScanRequestSchema,
  checksumKind: ChecksumKindSchema.default('SHA256'),
});

export type ScanProfile = z.infer<typeof ScanProfileSchema>;
