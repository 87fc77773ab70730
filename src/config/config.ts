import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { ConfigValidationError, errorMessage } from '../errors.js';
import type { ClassifierRules } from '../filters/file-classifier.js';

export const CONFIG_FILE_NAME = 'fixtrim.config.json';

const repositorySchema = z.object({
  testPathPatterns: z.array(z.string()).default([]),
  derivedArtifactPatterns: z.array(z.string()).default([]),
  /** Bug folders (e.g. `Cirq#3497`) whose bug lives in the test suite. */
  bugIsInTestCode: z.array(z.string()).default([]),
}).strict();

export const configSchema = z.object({
  concurrency: z.number().int().min(1).max(64).default(4),
  pairing: z.enum(['all', 'common-only']).default('all'),
  repositories: z.record(z.string(), repositorySchema).default({}),
}).strict();

export type RawConfig = z.infer<typeof configSchema>;
export type Pairing = RawConfig['pairing'];

export interface RepositoryConfig {
  rules: ClassifierRules;
  bugIsInTestCode: Set<string>;
}

export interface FixtrimConfig {
  concurrency: number;
  pairing: Pairing;
  repositories: Map<string, RepositoryConfig>;
}

function compilePatterns(patterns: string[], where: string, problems: string[]): RegExp[] {
  const compiled: RegExp[] = [];
  for (const source of patterns) {
    try {
      compiled.push(new RegExp(source));
    } catch (err) {
      problems.push(`${where}: ${errorMessage(err)}`);
    }
  }
  return compiled;
}

/** Validates a parsed config object and compiles its patterns. */
export function parseConfig(raw: unknown, filePath: string | null = null): FixtrimConfig {
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigValidationError(
      filePath,
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const problems: string[] = [];
  const repositories = new Map<string, RepositoryConfig>();
  for (const [name, repo] of Object.entries(parsed.data.repositories)) {
    repositories.set(name, {
      rules: {
        testPathPatterns: compilePatterns(repo.testPathPatterns, `repositories.${name}.testPathPatterns`, problems),
        derivedArtifactPatterns: compilePatterns(repo.derivedArtifactPatterns, `repositories.${name}.derivedArtifactPatterns`, problems),
      },
      bugIsInTestCode: new Set(repo.bugIsInTestCode),
    });
  }
  if (problems.length > 0) throw new ConfigValidationError(filePath, problems);

  return {
    concurrency: parsed.data.concurrency,
    pairing: parsed.data.pairing,
    repositories,
  };
}

/**
 * Loads the configuration from `explicitPath`, or from `fixtrim.config.json`
 * in `cwd` when present. Missing default file → defaults.
 */
export function loadConfig(explicitPath: string | null, cwd: string = process.cwd()): FixtrimConfig {
  const filePath = explicitPath ?? join(cwd, CONFIG_FILE_NAME);
  if (!existsSync(filePath)) {
    if (explicitPath) throw new ConfigValidationError(explicitPath, ['file not found']);
    return parseConfig({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (err) {
    throw new ConfigValidationError(filePath, [`invalid JSON: ${errorMessage(err)}`]);
  }
  return parseConfig(raw, filePath);
}

const NO_REPOSITORY: RepositoryConfig = {
  rules: { testPathPatterns: [], derivedArtifactPatterns: [] },
  bugIsInTestCode: new Set(),
};

export function repositoryConfig(config: FixtrimConfig, repository: string): RepositoryConfig {
  return config.repositories.get(repository) ?? NO_REPOSITORY;
}
