/**
 * Waypoint color ids in index order. The index is what the minimap stores,
 * so the order must not change.
 */
export const WAYPOINT_COLORS = [
  "black",
  "dark_blue",
  "dark_green",
  "dark_aqua",
  "dark_red",
  "dark_purple",
  "gold",
  "gray",
  "dark_gray",
  "blue",
  "green",
  "aqua",
  "red",
  "light_purple",
  "yellow",
  "white"
] as const;

export type WaypointColor = (typeof WAYPOINT_COLORS)[number];

export function colorIndex(name: string): number {
  return WAYPOINT_COLORS.findIndex((c) => c === name);
}

export function isWaypointColor(name: string): name is WaypointColor {
  return colorIndex(name) !== -1;
}
