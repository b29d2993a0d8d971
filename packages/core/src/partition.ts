import { VolumeCountError } from './errors';

/** Throws VolumeCountError unless 1 <= volumes <= itemCount. */
export function assertVolumeCount(volumes: number, itemCount: number): void {
  if (!Number.isInteger(volumes) || volumes < 1 || volumes > itemCount) {
    throw new VolumeCountError(volumes, itemCount);
  }
}

/**
 * Split `items` into `volumes` contiguous groups whose sizes differ by at most
 * one; the first `items.length % volumes` groups take the extra item.
 */
export function partitionVolumes<T>(items: readonly T[], volumes: number): T[][] {
  assertVolumeCount(volumes, items.length);

  const base = Math.floor(items.length / volumes);
  const remainder = items.length % volumes;
  const groups: T[][] = [];
  let start = 0;
  for (let i = 0; i < volumes; i += 1) {
    const size = base + (i < remainder ? 1 : 0);
    groups.push(items.slice(start, start + size));
    start += size;
  }
  return groups;
}
