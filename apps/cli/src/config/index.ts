/**
 * CLI Configuration
 *
 * Flags > environment > debkit.json > defaults.
 */

import { z } from 'zod';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { ConfigError } from '@debkit/core';

export const CONFIG_FILE_NAME = 'debkit.json';

// Environment schema
const envSchema = z.object({
  DEBKIT_MAINTAINER: z.string().min(1).optional(),
  DEBKIT_OUTPUT_DIR: z.string().min(1).optional(),
  DEBKIT_STAGING_DIR: z.string().min(1).optional(),
});

// Config file schema
const configFileSchema = z.object({
  manifest: z.string().min(1).default('Cargo.toml'),
  name: z.string().min(1).optional(),
  architecture: z.string().min(1).optional(),
  binary: z.string().min(1).optional(),
  installName: z.string().min(1).optional(),
  installDir: z.string().min(1).default('usr/bin'),
  controlFile: z.string().min(1).optional(),
  maintainer: z.string().min(1).optional(),
  description: z.string().min(1).optional(),
  stagingDir: z.string().min(1).default('packages/debian/staging'),
  outputDir: z.string().min(1).default('.'),
}).strict();

type ConfigFile = z.infer<typeof configFileSchema>;

export interface CliConfig extends ConfigFile {
  configFile?: string;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

// Load config from file; a missing file is fine, a broken one is not
function loadConfigFile(path: string): unknown {
  if (!existsSync(path)) {
    return {};
  }
  try {
    return JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(path, [error instanceof Error ? error.message : 'unreadable']);
  }
}

export function loadConfig(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): CliConfig {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  const parsedEnv = envSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new ConfigError('environment', formatIssues(parsedEnv.error));
  }

  const parsedFile = configFileSchema.safeParse(loadConfigFile(configPath));
  if (!parsedFile.success) {
    throw new ConfigError(configPath, formatIssues(parsedFile.error));
  }

  const file = parsedFile.data;
  const vars = parsedEnv.data;

  return {
    ...file,
    maintainer: vars.DEBKIT_MAINTAINER ?? file.maintainer,
    outputDir: vars.DEBKIT_OUTPUT_DIR ?? file.outputDir,
    stagingDir: vars.DEBKIT_STAGING_DIR ?? file.stagingDir,
    configFile: existsSync(configPath) ? configPath : undefined,
  };
}

export type { ConfigFile };
