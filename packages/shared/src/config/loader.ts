import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import type { ZodError } from 'zod';
import { ConfigError } from '../errors';
import { ScanProfile, ScanProfileSchema, ScanRequest, ScanRequestSchema } from './schema';

function formatIssues(error: ZodError): string {
  return error.issues.map((i) => `- ${i.path.join('.')}: ${i.message}`).join('\n');
}

/**
 * Validates a caller-supplied scan request and fills in its defaults.
 */
export function parseScanRequest(input: unknown): ScanRequest {
  const result = ScanRequestSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(`Scan request validation failed:\n${formatIssues(result.error)}`);
  }
  return result.data;
}

export class ProfileLoader {
  static loadYaml(filePath: string): unknown {
    if (!fs.existsSync(filePath)) {
      throw new ConfigError(`Profile file not found: ${filePath}`);
    }
    try {
      const content = fs.readFileSync(filePath, 'utf8');
      return yaml.load(content);
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
  }

  /**
   * Loads a scan profile. A relative `scan.basePath` is taken relative to the
   * directory holding the profile, not the process working directory.
   */
  static load(filePath: string): ScanProfile {
    const raw = this.loadYaml(filePath);

    const result = ScanProfileSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigError(`Profile validation failed:\n${formatIssues(result.error)}`, {
        details: { profile: filePath },
      });
    }

    const profile = result.data;
    return {
      ...profile,
      scan: {
        ...profile.scan,
        basePath: path.resolve(path.dirname(filePath), profile.scan.basePath),
      },
    };
  }
}
