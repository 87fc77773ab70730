import { test } from 'node:test';
import assert from 'node:assert/strict';

import { canonicalCode, canonicalImport, dedentLiteral } from '../src/equivalence/canonical-form.js';
import { resolveEquivalence } from '../src/equivalence/equivalence-resolver.js';
import { canonicalForm, partitionImports, propagateImportRuns } from '../src/equivalence/import-runs.js';
import { describePair } from '../src/filters/file-classifier.js';
import { languageFor } from '../src/languages/registry.js';
import type { NormalizedPair } from '../src/types.js';

function normalized(path: string, before: string, after: string): NormalizedPair {
  return {
    pair: describePair({ path, beforeText: before, afterText: after, status: 'modified' }),
    beforeNormalized: before,
    afterNormalized: after,
    ambiguousLanguage: false,
  };
}

const python = languageFor('a.py');
const typescript = languageFor('a.ts');

// ── Canonical forms ────────────────────────────────────────────────────────────

test('canonicalCode drops whitespace around operators and punctuation', () => {
  assert.equal(canonicalCode('x = a + b\n', python), 'x=a+b');
  assert.equal(canonicalCode('x = f(1, 2)\n', python), 'x=f(1,2)');
});

test('canonicalCode keeps whitespace that separates tokens', () => {
  assert.equal(canonicalCode('return x\n', python), 'return x');
  assert.equal(canonicalCode('y = a - -b\n', python), 'y=a- -b');
});

test('canonicalCode keeps indentation only where it is syntax', () => {
  assert.equal(canonicalCode('if a:\n    b()\n', python), 'if a:\n    b()');
  assert.equal(canonicalCode('if (a) {\n    b();\n}\n', typescript), 'if(a){b();}');
});

test('canonicalCode joins lines inside open brackets', () => {
  assert.equal(canonicalCode('f(a,\n  b)\n', python), 'f(a,b)');
});

test('dedentLiteral removes the common indentation after the first line', () => {
  assert.equal(dedentLiteral('"""\n    a\n      b\n    """'), '"""\na\n  b\n"""');
  assert.equal(dedentLiteral('"one line"'), '"one line"');
});

test('canonicalImport sorts imported names', () => {
  assert.equal(canonicalImport('from a import c, b', python), 'from a import b,c');
  assert.equal(canonicalImport('from a import (\n    c,\n    b,\n)', python), 'from a import b,c');
  assert.equal(canonicalImport('import { b, a } from "x";', typescript), 'import{a,b}from"x";');
});

test('partitionImports groups consecutive imports with the filler between them', () => {
  const blocks = partitionImports(['import os', '', '# local', 'import sys', 'x = 1'], python);
  assert.deepEqual(blocks, [
    { kind: 'imports', lines: ['import os', '', '# local', 'import sys'], statements: ['import os', 'import sys'] },
    { kind: 'code', lines: ['x = 1'] },
  ]);
});

test('an import-looking line inside a string literal is code', () => {
  const blocks = partitionImports(['s = """', 'import os', '"""'], python);
  assert.deepEqual(blocks, [{ kind: 'code', lines: ['s = """', 'import os', '"""'] }]);
});

test('propagateImportRuns keeps the before order of a reordered run', () => {
  const before = ['import b', 'import a', '', 'x = 1'];
  const after = ['import a', 'import b', '', 'x = 2'];
  assert.deepEqual(propagateImportRuns(before, after, python), ['import b', 'import a', '', 'x = 2']);
});

test('canonicalCode writes comments as their collapsed key unless told to drop them', () => {
  assert.equal(canonicalCode('x = 1  # one\n', python), 'x=1# one');
  assert.equal(canonicalCode('x = 1  #   one\n', python), 'x=1# one');
  assert.equal(canonicalCode('x = 1  # one\n', python, 'drop'), 'x=1');
  assert.equal(canonicalForm('x = 1  # one\n', python, 'drop'), canonicalForm('x = 1\n', python));
});

// ── Resolver ───────────────────────────────────────────────────────────────────

test('reordered imports are equivalent', () => {
  const verdict = resolveEquivalence(normalized('src/app.py', 'import b\nimport a\nfoo()', 'import a\nimport b\nfoo()'));
  assert.deepEqual(verdict, { kind: 'Equivalent', path: 'src/app.py', changeUnits: 0 });
});

test('reordered names inside a braced import are equivalent', () => {
  const verdict = resolveEquivalence(normalized(
    'src/app.ts',
    'import { b, a } from "x";\nrun();\n',
    'import { a, b } from "x";\nrun();\n'
  ));
  assert.equal(verdict.kind, 'Equivalent');
});

test('spacing around operators is equivalent', () => {
  assert.equal(resolveEquivalence(normalized('src/a.py', 'x = a+b\n', 'x = a + b\n')).kind, 'Equivalent');
});

test('a reindented multi-line string literal is equivalent', () => {
  const before = 'x = f("""\n    a\n    b\n    """)\n';
  const after = 'x = f("""\n        a\n        b\n        """)\n';
  assert.equal(resolveEquivalence(normalized('src/a.py', before, after)).kind, 'Equivalent');
});

test('a changed literal is distinct', () => {
  const verdict = resolveEquivalence(normalized('src/f.py', 'def f(x):\n  return x+1', 'def f(x):\n  return x+2'));
  assert.deepEqual(verdict, {
    kind: 'Distinct',
    path: 'src/f.py',
    changeUnits: 1,
    changedLines: 1,
    hunks: [{ beforeStart: 1, afterStart: 1, deleted: ['  return x+1'], added: ['  return x+2'] }],
  });
});

test('whitespace that changes tokenization is distinct', () => {
  assert.equal(resolveEquivalence(normalized('src/a.py', 'y = a - -b\n', 'y = a --b\n')).kind, 'Distinct');
});

test('reindenting python code is distinct', () => {
  assert.equal(
    resolveEquivalence(normalized('src/a.py', 'if a:\n    b()\nc()\n', 'if a:\n    b()\n    c()\n')).kind,
    'Distinct'
  );
});

test('an import reorder next to a real change only counts the real change', () => {
  const verdict = resolveEquivalence(normalized('src/a.py', 'import b\nimport a\n\nx = 1\n', 'import a\nimport b\n\nx = 2\n'));
  assert.deepEqual(verdict, {
    kind: 'Distinct',
    path: 'src/a.py',
    changeUnits: 1,
    changedLines: 1,
    hunks: [{ beforeStart: 3, afterStart: 3, deleted: ['x = 1'], added: ['x = 2'] }],
  });
});

test('an inert unit takes the before version and is not counted', () => {
  const verdict = resolveEquivalence(normalized('src/a.py', 'a = f(1,2)\nb = 1\nc = 3\n', 'a = f(1, 2)\nb = 1\nc = 4\n'));
  assert.equal(verdict.kind, 'Distinct');
  if (verdict.kind !== 'Distinct') return;
  assert.equal(verdict.changeUnits, 1);
  assert.deepEqual(verdict.hunks, [{ beforeStart: 2, afterStart: 2, deleted: ['c = 3'], added: ['c = 4'] }]);
});

test('equivalence holds in both directions', () => {
  const cases: Array<[string, string, string]> = [
    ['src/app.py', 'import b\nimport a\nfoo()', 'import a\nimport b\nfoo()'],
    ['src/a.py', 'x = a+b\n', 'x = a + b\n'],
    ['src/a.ts', 'import { b, a } from "x";\n', 'import { a, b } from "x";\n'],
    ['src/a.py', 'x = f("""\n    a\n    """)\n', 'x = f("""\n  a\n  """)\n'],
    ['src/a.py', 'x = 1  # a\ny = 2\n', 'x = 1\ny = 2  # a\n'],
  ];
  for (const [path, before, after] of cases) {
    assert.equal(resolveEquivalence(normalized(path, before, after)).kind, 'Equivalent', path);
    assert.equal(resolveEquivalence(normalized(path, after, before)).kind, 'Equivalent', path);
  }
});

test('unknown languages only forgive trailing whitespace and blank lines', () => {
  assert.equal(resolveEquivalence(normalized('notes.txt', 'a\n', 'a  \n\n')).kind, 'Equivalent');
  assert.equal(resolveEquivalence(normalized('notes.txt', 'a b\n', 'a  b\n')).kind, 'Distinct');
});

test('deleting a comment is a change', () => {
  const verdict = resolveEquivalence(normalized('src/a.py', 'x = 1\n# keep x positive\ny = 2\n', 'x = 1\ny = 2\n'));
  assert.deepEqual(verdict, {
    kind: 'Distinct',
    path: 'src/a.py',
    changeUnits: 1,
    changedLines: 1,
    hunks: [{ beforeStart: 1, afterStart: 1, deleted: ['# keep x positive'], added: [] }],
  });
});

test('deleting a docstring is a change', () => {
  const verdict = resolveEquivalence(normalized(
    'src/f.py',
    'def f():\n    """Return one."""\n    return 1\n',
    'def f():\n    return 1\n'
  ));
  assert.deepEqual(verdict, {
    kind: 'Distinct',
    path: 'src/f.py',
    changeUnits: 1,
    changedLines: 1,
    hunks: [{ beforeStart: 1, afterStart: 1, deleted: ['    """Return one."""'], added: [] }],
  });
});

test('a comment moved to another line, with no comment added or lost, is equivalent', () => {
  const verdict = resolveEquivalence(normalized('src/a.py', 'x = 1  # a\ny = 2\n', 'x = 1\ny = 2  # a\n'));
  assert.deepEqual(verdict, { kind: 'Equivalent', path: 'src/a.py', changeUnits: 0 });
});

test('many scattered one-line edits each count as a unit', () => {
  const before: string[] = [];
  const after: string[] = [];
  for (let i = 0; i < 3000; i++) {
    before.push(`v${i} = ${i}`);
    after.push(i % 15 === 0 ? `v${i} = ${i + 1}` : `v${i} = ${i}`);
  }
  const verdict = resolveEquivalence(normalized('src/big.py', before.join('\n') + '\n', after.join('\n') + '\n'));
  assert.equal(verdict.kind, 'Distinct');
  if (verdict.kind !== 'Distinct') return;
  assert.equal(verdict.changeUnits, 200);
  assert.equal(verdict.changedLines, 200);
  assert.deepEqual(verdict.hunks[1], { beforeStart: 15, afterStart: 15, deleted: ['v15 = 15'], added: ['v15 = 16'] });
});
