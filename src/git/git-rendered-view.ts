import { decodePair, type RenderRequest, type RenderedView, type RenderedViewProvider } from '../dataset/fallback.js';
import { readChangedFiles } from './commit-miner.js';

/**
 * Renders a merge commit against its first parent from a local clone, the
 * way the hosting platform shows "previous" and "current" for a merge.
 */
export class GitRenderedViewProvider implements RenderedViewProvider {
  readonly name = 'git-first-parent';

  constructor(private readonly repoPath: string) {}

  async render(request: RenderRequest): Promise<RenderedView> {
    const view: RenderedView = { pairs: [], warnings: [] };
    const first = request.parents[0];
    if (first === undefined) return view;

    for (const file of readChangedFiles(this.repoPath, first, request.commitId.hash)) {
      const pair = decodePair(file.path, file.status, file.before, file.after, view.warnings);
      if (pair) view.pairs.push(pair);
    }
    return view;
  }
}
