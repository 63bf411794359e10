import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';

import { fileConfigSchema, formSchema } from '../schema/index.js';
import type { FileConfig, FormSchema } from '../schema/index.js';
import { ConfigError } from '../core/errors.js';

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a `.formsweep.yaml` (or JSON) config file.
 * A missing file is only an error when `required` is set; the default
 * config path is optional.
 */
export async function loadConfigFile(
  configPath: string,
  required = false,
): Promise<FileConfig> {
  const raw = await readOptional(configPath);
  if (raw === undefined) {
    if (required) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    return {};
  }

  const parsed = parseDocument(configPath, raw) ?? {};
  return validate(configPath, () => fileConfigSchema.parse(parsed));
}

/** Load and validate a form schema file. The file must exist. */
export async function loadFormSchema(formPath: string): Promise<FormSchema> {
  const raw = await readOptional(formPath);
  if (raw === undefined) {
    throw new ConfigError(`Form schema not found: ${formPath}`);
  }
  const parsed = parseDocument(formPath, raw);
  return validate(formPath, () => formSchema.parse(parsed));
}

// ── Helpers ─────────────────────────────────────────────────

async function readOptional(filePath: string): Promise<string | undefined> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (err) {
    if (isNodeError(err) && err.code === 'ENOENT') return undefined;
    throw err;
  }
}

function parseDocument(filePath: string, raw: string): unknown {
  try {
    return filePath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`${filePath}: ${message}`);
  }
}

function validate<T>(filePath: string, parse: () => T): T {
  try {
    return parse();
  } catch (err) {
    if (err instanceof ZodError) {
      throw new ConfigError(`${filePath}: ${formatZodError(err)}`);
    }
    throw err;
  }
}

export function formatZodError(err: ZodError): string {
  return err.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    })
    .join('; ');
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
