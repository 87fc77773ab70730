import { join } from 'path';
import { EncodingError, errorMessage } from '../errors.js';
import type { CommitId, FileStatus, PipelineWarning, RawFilePair, SourceState } from '../types.js';
import { decodeText, readTree } from './file-tree.js';

export interface RenderRequest {
  commitId: CommitId;
  parents: readonly string[];
  /** The bug folder holding the commit. */
  folder: string;
}

export interface RenderedView {
  pairs: RawFilePair[];
  /** Files of the view that were left out, such as undecodable ones. */
  warnings: PipelineWarning[];
}

/**
 * Supplies before/after content for a merge commit whose single-parent diff
 * could not be mined. Returns an empty view when it has none to offer.
 */
export interface RenderedViewProvider {
  readonly name: string;
  render(request: RenderRequest): Promise<RenderedView>;
}

export function isEmptyView(view: RenderedView): boolean {
  return view.pairs.length === 0 && view.warnings.length === 0;
}

/**
 * Decodes both sides of one file. A file that is not text is left out and
 * reported in `warnings`; the caller keeps going with the other files.
 */
export function decodePair(
  path: string,
  status: FileStatus,
  before: Uint8Array | undefined,
  after: Uint8Array | undefined,
  warnings: PipelineWarning[]
): RawFilePair | null {
  try {
    return {
      path,
      beforeText: before === undefined ? undefined : decodeText(path, before),
      afterText: after === undefined ? undefined : decodeText(path, after),
      status,
    };
  } catch (err) {
    if (!(err instanceof EncodingError)) throw err;
    warnings.push({ kind: 'encoding-error', path, message: err.message });
    return null;
  }
}

/**
 * A commit with several parents and nothing mined needs the rendered view.
 * Everything else keeps the mined diff, even when it is empty.
 */
export function resolveSourceState(parentCount: number, minedPairCount: number): SourceState {
  return parentCount > 1 && minedPairCount === 0 ? 'FallbackRequired' : 'MinedDiffAvailable';
}

/** Pairs two file trees by path; one-sided paths become additions or deletions. */
export function pairTrees(previous: Map<string, Uint8Array>, current: Map<string, Uint8Array>): RenderedView {
  const view: RenderedView = { pairs: [], warnings: [] };
  const paths = [...new Set([...previous.keys(), ...current.keys()])].sort();
  for (const path of paths) {
    const before = previous.get(path);
    const after = current.get(path);
    const status = before === undefined ? 'added' : after === undefined ? 'deleted' : 'modified';
    const pair = decodePair(path, status, before, after, view.warnings);
    if (pair) view.pairs.push(pair);
  }
  return view;
}

/**
 * The "previous"/"current" pages of the hosting platform, saved by the
 * curator under `<folder>/rendered/previous` and `<folder>/rendered/current`.
 */
export class DirectoryRenderedViewProvider implements RenderedViewProvider {
  readonly name = 'rendered-directory';

  async render(request: RenderRequest): Promise<RenderedView> {
    const root = join(request.folder, 'rendered');
    const previous = await readTree(join(root, 'previous'));
    const current = await readTree(join(root, 'current'));
    return pairTrees(previous, current);
  }
}

/**
 * Tries providers in order and returns the first non-empty view.
 * Provider failures are collected and reported if every provider comes back
 * empty-handed.
 */
export class FallbackChain implements RenderedViewProvider {
  readonly name: string;

  constructor(private readonly providers: RenderedViewProvider[]) {
    this.name = providers.map(p => p.name).join(' → ');
  }

  async render(request: RenderRequest): Promise<RenderedView> {
    const failures: string[] = [];
    for (const provider of this.providers) {
      try {
        const view = await provider.render(request);
        if (!isEmptyView(view)) return view;
      } catch (err) {
        failures.push(`${provider.name}: ${errorMessage(err)}`);
      }
    }
    if (failures.length > 0) throw new Error(`no rendered view available (${failures.join('; ')})`);
    return { pairs: [], warnings: [] };
  }
}
