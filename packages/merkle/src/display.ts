import { toHex } from '@arbor/crypto';

import type { DisplayOptions, MerkleNode } from './types';

function levelLabel(level: number, top: number): string {
  if (level === 0 && top === 0) return 'leaves, root';
  if (level === 0) return 'leaves';
  if (level === top) return 'root';
  return '';
}

/**
 * Render every level's digests, leaves first.
 *
 * ```text
 * MerkleTree(sha256, leaves=3, depth=2)
 * level 0 (leaves)
 *   [0] ca97…
 *   [3] 2e7d… (duplicate)
 * level 1
 *   ...
 * level 2 (root)
 *   [0] 7075…
 * ```
 */
export function renderLevels<C>(
  header: string,
  levels: readonly (readonly MerkleNode<C>[])[],
  options?: DisplayOptions,
): string {
  const lines: string[] = [header];
  const top = levels.length - 1;
  levels.forEach((nodes, level) => {
    const label = levelLabel(level, top);
    lines.push(label ? `level ${level} (${label})` : `level ${level}`);
    for (const node of nodes) {
      if (node.isDuplicate && options?.hideDuplicates) {
        continue;
      }
      lines.push(`  [${node.index}] ${toHex(node.digest)}${node.isDuplicate ? ' (duplicate)' : ''}`);
    }
  });
  return lines.join('\n');
}
