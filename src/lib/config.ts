/**
 * Runtime configuration from environment variables and the local git checkout
 */

import path from 'path';
import { execSync } from 'child_process';
import { config as loadDotenv } from 'dotenv';
import { DEFAULT_REGISTRY_FILE } from './id-registry';

export interface ImportConfig {
  repo: string | null;
  registryFile: string;
  taxonomyFile: string | null;
}

/**
 * Load .env.local, then .env, from the directory the command runs in
 */
export function loadEnvFiles(cwd: string = process.cwd()): void {
  loadDotenv({ path: path.join(cwd, '.env.local') });
  loadDotenv({ path: path.join(cwd, '.env') });
}

/**
 * Parse "owner/repo" from a GitHub remote URL
 */
export function parseGitHubRemote(remoteUrl: string): string | null {
  // https://github.com/owner/repo.git
  // git@github.com:owner/repo.git
  const match = remoteUrl.trim().match(/github\.com[:/]([^/]+\/[^/\s]+?)(?:\.git)?\/?$/);
  return match ? match[1] : null;
}

/**
 * Detect GitHub repo from the origin remote of the working directory
 */
export function detectGitHubRepo(cwd: string = process.cwd()): string | null {
  try {
    const remoteUrl = execSync('git config --get remote.origin.url', {
      cwd,
      encoding: 'utf8',
      stdio: ['pipe', 'pipe', 'pipe'],
    });
    return parseGitHubRemote(remoteUrl);
  } catch {
    // not a git checkout, or no origin remote
    return null;
  }
}

/**
 * Get GitHub token from gh CLI or env var
 */
export function getGitHubToken(env: NodeJS.ProcessEnv = process.env): string | null {
  try {
    const token = execSync('gh auth token', {
      encoding: 'utf8',
      stdio: ['pipe', 'pipe', 'pipe'],
    }).trim();
    if (token) return token;
  } catch {
    // gh CLI not available or not authenticated
  }

  return env.GITHUB_TOKEN || null;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): ImportConfig {
  return {
    repo: env.GITHUB_REPO || detectGitHubRepo(cwd),
    registryFile: path.resolve(cwd, env.BACKLOG_REGISTRY_FILE || DEFAULT_REGISTRY_FILE),
    taxonomyFile: env.BACKLOG_TAXONOMY_FILE ? path.resolve(cwd, env.BACKLOG_TAXONOMY_FILE) : null,
  };
}
