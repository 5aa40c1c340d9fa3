/**
 * External Tool Configuration
 *
 * Centralized resolution of the external tools the pipeline spawns.
 *
 * Priority order:
 * 1. Environment variables (e.g., DPKG_DEB_PATH)
 * 2. System PATH
 */

import { existsSync } from 'node:fs';
import { executeCommand } from '@debkit/utils';

/**
 * Tool configuration interface
 */
export interface ToolConfig {
  name: string;
  envVar: string;
  resolvedPath: string;
  fromEnv: boolean;
}

/**
 * All external tools
 */
export interface ToolsConfig {
  dpkgDeb: ToolConfig;
  apt: ToolConfig;
  sudo: ToolConfig;
}

/**
 * Resolve tool path:
 * 1. Environment variable, when it points at an existing file
 * 2. Bare name, left to the system PATH
 */
function resolveToolPath(
  name: string,
  envVar: string,
  env: NodeJS.ProcessEnv
): ToolConfig {
  const envPath = env[envVar];
  if (envPath && existsSync(envPath)) {
    return { name, envVar, resolvedPath: envPath, fromEnv: true };
  }

  // Can't cheaply check PATH binaries; a missing tool fails at spawn time
  return { name, envVar, resolvedPath: name, fromEnv: false };
}

/**
 * Get all tool configurations
 */
export function getToolsConfig(env: NodeJS.ProcessEnv = process.env): ToolsConfig {
  return {
    dpkgDeb: resolveToolPath('dpkg-deb', 'DPKG_DEB_PATH', env),
    apt: resolveToolPath('apt', 'APT_PATH', env),
    sudo: resolveToolPath('sudo', 'SUDO_PATH', env),
  };
}

let _tools: ToolsConfig | null = null;

/**
 * Get tool configurations (cached)
 */
export function tools(): ToolsConfig {
  if (!_tools) {
    _tools = getToolsConfig();
  }
  return _tools;
}

export function getToolPath(name: keyof ToolsConfig): string {
  return tools()[name].resolvedPath;
}

/**
 * Check if a tool is available by running it with --version
 */
export async function isToolAvailable(name: keyof ToolsConfig): Promise<boolean> {
  try {
    const result = await executeCommand(getToolPath(name), ['--version'], {
      timeout: 5000,
    });
    return result.exitCode === 0;
  } catch {
    return false;
  }
}
