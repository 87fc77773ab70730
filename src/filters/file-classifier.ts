import { fileNameOf, languageFor } from '../languages/registry.js';
import type {
  ClassificationContext,
  ClassificationOutcome,
  FilePair,
  RawFilePair,
} from '../types.js';

const TEST_DIRS = new Set([
  'test', 'tests', 'testing', '__tests__', 'spec', 'specs',
  'unittest', 'unittests', 'unit_tests', 'integration_tests', 'e2e',
]);

const TEST_FILE_PATTERNS: RegExp[] = [
  /^test_.+\.\w+$/,              // test_scheduler.py
  /^conftest\.py$/,
  /[_.-]test\.\w+$/i,            // scheduler_test.go, scheduler.test.ts
  /[_.-]tests\.\w+$/i,           // scheduler_tests.py
  /\.spec\.\w+$/i,               // scheduler.spec.ts
  /[a-z0-9](?:Test|Tests|Spec)\.\w+$/, // SchedulerTest.java, SimulatorTests.cs
];

// JSON fixtures regenerated from the code under test
const DERIVED_ARTIFACT_PATTERNS: RegExp[] = [
  /(?:^|\/)(?:mocks?|__mocks__|fixtures?)\/(?:[^/]+\/)*[^/]+\.json$/i,
  /(?:^|\/)[^/]*mock[^/]*\.json$/i,
];

export interface ClassifierRules {
  /** Extra test-path patterns for one repository. */
  testPathPatterns: RegExp[];
  /** Extra derived-artifact patterns for one repository. */
  derivedArtifactPatterns: RegExp[];
}

export const DEFAULT_RULES: ClassifierRules = {
  testPathPatterns: [],
  derivedArtifactPatterns: [],
};

export function isTestPath(path: string, rules: ClassifierRules = DEFAULT_RULES): boolean {
  const segments = path.split('/');
  const dirs = segments.slice(0, -1);
  if (dirs.some(seg => TEST_DIRS.has(seg.toLowerCase()))) return true;

  const name = fileNameOf(path);
  if (TEST_FILE_PATTERNS.some(re => re.test(name))) return true;

  return rules.testPathPatterns.some(re => re.test(path));
}

export function isDerivedArtifact(path: string, rules: ClassifierRules = DEFAULT_RULES): boolean {
  return DERIVED_ARTIFACT_PATTERNS.some(re => re.test(path))
    || rules.derivedArtifactPatterns.some(re => re.test(path));
}

/** Attaches the path-derived labels a classifier needs to a raw pair. */
export function describePair(raw: RawFilePair, rules: ClassifierRules = DEFAULT_RULES): FilePair {
  return {
    ...raw,
    language: languageFor(raw.path).id,
    isTestFile: isTestPath(raw.path, rules),
    isDerivedArtifact: isDerivedArtifact(raw.path, rules),
  };
}

function isBlank(text: string | undefined): boolean {
  return text === undefined || text.trim() === '';
}

/**
 * Decides whether a file pair takes part in counting. First match wins:
 * empty, identical, test file for a bug outside the test suite, derived
 * artifact, otherwise included.
 */
export function classify(pair: FilePair, context: ClassificationContext): ClassificationOutcome {
  if (isBlank(pair.beforeText) && isBlank(pair.afterText)) {
    return { kind: 'Excluded', reason: 'empty' };
  }
  if (pair.beforeText === pair.afterText) {
    return { kind: 'Excluded', reason: 'identical' };
  }
  if (pair.isTestFile && !context.bugIsInTestCode) {
    return { kind: 'Excluded', reason: 'test-not-bug' };
  }
  if (pair.isDerivedArtifact) {
    return { kind: 'Excluded', reason: 'derived-mock' };
  }
  return { kind: 'Included' };
}
