import { Injectable } from '@nestjs/common';
import { EngineInvariantError } from '../../common/errors/game-errors.js';
import type {
  StateDiff,
  TreeNode,
  TreeValue,
  WorldState,
} from '../../types/index.js';

type Container = TreeNode | TreeValue[];

function toIndex(key: string, length: number, path: string): number {
  const index = Number(key);
  if (!Number.isInteger(index) || index < 0 || index > length) {
    throw new EngineInvariantError(`Invalid array index "${key}" in path ${path}`);
  }
  return index;
}

function readChild(container: Container, key: string, path: string): TreeValue {
  if (Array.isArray(container)) {
    return container[toIndex(key, container.length, path)];
  }
  return container[key];
}

function writeChild(container: Container, key: string, value: TreeValue, path: string): void {
  if (Array.isArray(container)) {
    container[toIndex(key, container.length, path)] = value;
    return;
  }
  container[key] = value;
}

function splitPath(path: string): string[] {
  const segments = path.split('.');
  if (segments.some((s) => s.length === 0)) {
    throw new EngineInvariantError(`Malformed diff path: "${path}"`);
  }
  return segments;
}

/**
 * Applies ordered {op, path, value} mutations. The same diffs feed the canonical
 * authority and every phase-local mirror, so both must end up identical.
 */
@Injectable()
export class StateDiffService {
  /** Returns a new state; the input is left untouched. */
  apply(state: WorldState, diffs: StateDiff[]): WorldState {
    const next = structuredClone(state);
    this.applyInPlace(next, diffs);
    return next;
  }

  applyInPlace(root: TreeNode, diffs: StateDiff[]): void {
    for (const diff of diffs) {
      const segments = splitPath(diff.path);
      const last = segments[segments.length - 1];
      const parent = this.resolveParent(root, segments.slice(0, -1), diff);
      if (!parent) continue; // removing under a missing branch is a no-op

      if (diff.op === 'set') {
        writeChild(parent, last, diff.value, diff.path);
      } else if (Array.isArray(parent)) {
        throw new EngineInvariantError(`Cannot remove array element via ${diff.path}`);
      } else {
        delete parent[last];
      }
    }
  }

  private resolveParent(
    root: TreeNode,
    keys: string[],
    diff: StateDiff,
  ): Container | null {
    let container: Container = root;
    for (const key of keys) {
      let next = readChild(container, key, diff.path);
      if (next === undefined || next === null) {
        if (diff.op === 'remove') return null;
        next = {};
        writeChild(container, key, next, diff.path);
      }
      if (typeof next !== 'object') {
        throw new EngineInvariantError(
          `Diff path ${diff.path} traverses a scalar at "${key}"`,
        );
      }
      container = next;
    }
    return container;
  }
}
