import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ArtifactPolicy, ArtifactReporter, ProvisionalOutcome } from '../types.js';

export interface LogSource {
  id: string;
  log: string[];
}

export function artifactDirName(scenarioId: string): string {
  return scenarioId.replace(/[^A-Za-z0-9._-]+/g, '_');
}

/**
 * Writes the outcome and every element log of a run under
 * `<root>/<scenario id>/`.
 */
export class FileArtifactCollector implements ArtifactReporter {
  private readonly root: string;
  private readonly scenarioId: string;
  private readonly sources: LogSource[];

  constructor(root: string, scenarioId: string, sources: LogSource[]) {
    this.root = root;
    this.scenarioId = scenarioId;
    this.sources = sources;
  }

  async collectArtifacts(policy: Readonly<ArtifactPolicy>, outcome: ProvisionalOutcome): Promise<void> {
    const dir = join(this.root, artifactDirName(this.scenarioId));
    await mkdir(dir, { recursive: true });

    await writeFile(
      join(dir, 'outcome.json'),
      JSON.stringify({ scenario: this.scenarioId, policy, outcome }, null, 2),
    );

    for (const source of this.sources) {
      await writeFile(join(dir, `${source.id}.log`), source.log.join('\n') + '\n');
    }
  }
}
