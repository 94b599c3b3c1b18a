/**
 * Engines compiled with Emscripten abort with one of these messages when
 * their heap is exhausted.
 */
const MEMORY_ERROR_MARKERS = ["Cannot enlarge memory arrays", "TOTAL_MEMORY", "Out of memory", "abort()"];

/**
 * Detect if an error is a memory-related error
 */
export function isMemoryError(error: unknown): boolean {
  const errorMessage = error instanceof Error ? error.message : String(error);
  return MEMORY_ERROR_MARKERS.some((marker) => errorMessage.includes(marker));
}
