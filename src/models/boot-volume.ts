/**
 * Boot volume rule: when the source has a system drive, the selection
 * must include one too.
 */

import { InvalidArgumentError } from "../errors.js";
import type { MountPoint } from "./mount-point.js";

/** Lowercased names that identify the boot volume. */
export const BOOT_VOLUME_NAMES: ReadonlySet<string> = new Set(["c:\\", "c:/", "c:"]);

export function isBootVolume(name: string): boolean {
  return BOOT_VOLUME_NAMES.has(name.toLowerCase());
}

/**
 * Throw InvalidArgumentError when `source` contains a boot volume and
 * `selected` contains none.
 */
export function assertBootVolumeSelected(
  source: readonly MountPoint[],
  selected: readonly MountPoint[],
): void {
  const sourceBoot = source.find((mp) => isBootVolume(mp.name));
  if (!sourceBoot) return;
  if (selected.some((mp) => isBootVolume(mp.name))) return;
  throw new InvalidArgumentError(
    `Boot volume ${sourceBoot.name} must be selected for migration because it exists in the source`,
  );
}
