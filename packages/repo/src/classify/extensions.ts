import fs from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError, errorMessage } from '@dirdigest/shared';
import bundledExtensions from './text-extensions.json';

export const TextExtensionsSchema = z.array(z.string().min(1));

/** Lower-cases and adds the leading dot `path.extname` reports. */
export function normalizeExtension(ext: string): string {
  const lower = ext.trim().toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

export function toExtensionSet(extensions: readonly string[]): ReadonlySet<string> {
  return new Set(extensions.map(normalizeExtension));
}

/**
 * Loads the text-extension allow-list: the bundled list, or a JSON array read from `file`.
 */
export async function loadTextExtensions(file?: string): Promise<ReadonlySet<string>> {
  if (!file) {
    return toExtensionSet(TextExtensionsSchema.parse(bundledExtensions));
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(file, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Cannot read text extensions file ${file}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const parsed = TextExtensionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Text extensions file ${file} must be a JSON array of strings`, {
      details: parsed.error.flatten().formErrors.join('; ') || parsed.error.message,
    });
  }
  return toExtensionSet(parsed.data);
}
