import { DEV } from 'esm-env';

/**
 * Debug configuration flag: Warn every time a mutation has to clone a chain shared with another copy
 */
export const WARN_ON_CLONE = 1 << 0;

/**
 * Current debug configuration bitfield
 */
let debugConfigFlags = 0;

/**
 * Configure debug behavior using a bitfield of flags
 */
export const debugConfig = (flags: number): void => {
    debugConfigFlags = flags | 0;
};

/**
 * Report a copy-on-write clone of `count` nodes.
 * Only runs in DEV mode and when WARN_ON_CLONE is enabled.
 */
export const warnOnClone: (count: number) => void = DEV
    ? (count: number) => {
          if (debugConfigFlags & WARN_ON_CLONE) {
              console.warn(
                  `[@valuelist/list] Mutating a list that shares its nodes with a copy cloned ${count} node${count === 1 ? '' : 's'}. Mutate the original or drop the copy first to avoid the clone.`
              );
          }
      }
    : () => {};
