import { promises as fs } from 'fs';
import path from 'path';
import YAML from 'yaml';
import { ZodError } from 'zod';
import { ConfigurationError, describeError } from '../utils/errors';
import { DEFAULT_PIPELINE, type PipelineFile, PipelineFileSchema } from './yaml-types';

const CONFIG_ROOT = process.env.CONFIG_ROOT ?? path.resolve(process.cwd(), 'config');

const cache = new Map<string, PipelineFile>();

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Parsed YAML document, or `undefined` when the file does not exist
 */
async function readYamlFile(filePath: string): Promise<unknown> {
  let fileContents: string;
  try {
    fileContents = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return undefined;
    }
    throw new ConfigurationError(`Failed to read configuration file ${filePath}: ${describeError(error)}`);
  }

  try {
    // An empty file parses to null; treat it as "all defaults"
    const parsed: unknown = YAML.parse(fileContents, { prettyErrors: true });
    return parsed ?? {};
  } catch (error) {
    throw new ConfigurationError(`Invalid YAML in ${filePath}: ${describeError(error)}`);
  }
}

export function parsePipelineConfig(value: unknown, fileLabel = 'pipeline.yaml'): PipelineFile {
  try {
    return PipelineFileSchema.parse(value);
  } catch (error) {
    const message =
      error instanceof ZodError
        ? error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
        : describeError(error);
    throw new ConfigurationError(`Invalid configuration in ${fileLabel}: ${message}`);
  }
}

/**
 * Pipeline tunables. An explicit path must exist; the default location
 * falls back to built-in defaults when absent.
 */
export async function loadPipelineConfig(overridePath?: string): Promise<PipelineFile> {
  const resolvedPath = overridePath ?? path.resolve(CONFIG_ROOT, 'pipeline.yaml');

  const cached = cache.get(resolvedPath);
  if (cached) {
    return cached;
  }

  const yamlValue = await readYamlFile(resolvedPath);
  if (yamlValue === undefined) {
    if (overridePath) {
      throw new ConfigurationError(`Missing configuration file: ${resolvedPath}`);
    }
    return DEFAULT_PIPELINE;
  }

  const parsed = parsePipelineConfig(yamlValue, resolvedPath);
  cache.set(resolvedPath, parsed);
  return parsed;
}

export function clearConfigCache(): void {
  cache.clear();
}
