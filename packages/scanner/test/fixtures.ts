export const START = "5 blocks from play + 0 bonus = 5 total.";
export const HEADER = "Claims:";
export const END = " = 900 blocks left to spend";

export function claimLine(world: string, x: number | string, z: number | string, size: number | string): string {
  return `${world}: x${x}, z${z} (${size} blocks)`;
}
