import { aarch64Target } from './aarch64.js';
import type { Target, TargetId } from './types.js';
import { x86_64Target } from './x86_64.js';

export const TARGET_IDS: readonly TargetId[] = [
  'x86_64-linux',
  'x86_64-macos',
  'aarch64-linux',
  'aarch64-macos',
];

export const DEFAULT_TARGET: TargetId = 'x86_64-linux';

export function isTargetId(value: string): value is TargetId {
  return TARGET_IDS.some((id) => id === value);
}

export function getTarget(id: TargetId): Target {
  switch (id) {
    case 'x86_64-linux':
      return x86_64Target('linux');
    case 'x86_64-macos':
      return x86_64Target('macos');
    case 'aarch64-linux':
      return aarch64Target('linux');
    case 'aarch64-macos':
      return aarch64Target('macos');
    default: {
      const unreachable: never = id;
      throw new Error(`Unknown target "${String(unreachable)}"`);
    }
  }
}

/**
 * Pick the target matching a Node.js `process.arch` / `process.platform` pair.
 *
 * Hosts other than x64/arm64 on Linux/macOS fall back to {@link DEFAULT_TARGET}.
 */
export function hostTarget(arch: string, platform: string): TargetId {
  const a = arch === 'arm64' ? 'aarch64' : arch === 'x64' ? 'x86_64' : undefined;
  const os = platform === 'darwin' ? 'macos' : platform === 'linux' ? 'linux' : undefined;
  if (!a || !os) return DEFAULT_TARGET;
  return `${a}-${os}`;
}
