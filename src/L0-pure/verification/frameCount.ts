/** Boundary frames the interpolation tool may legitimately drop. */
export const INTERPOLATION_FRAME_TOLERANCE = 2

/**
 * A time step of 0.5 doubles the frame count. Accept `out ≥ 2·in − 2`;
 * an empty input never passes.
 */
export function isInterpolationComplete(inputFrames: number, outputFrames: number): boolean {
  if (inputFrames <= 0) return false
  return outputFrames >= inputFrames * 2 - INTERPOLATION_FRAME_TOLERANCE
}

/** Count still-image frames in a directory listing. */
export function countFrames(entries: readonly string[]): number {
  return entries.filter((name) => name.toLowerCase().endsWith('.png')).length
}
