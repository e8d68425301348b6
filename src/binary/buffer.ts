/**
 * Check if data starts with a specific pattern
 */
export function startsWith(data: Uint8Array, pattern: Uint8Array | number[]): boolean {
  const patternArray = pattern instanceof Uint8Array ? pattern : new Uint8Array(pattern);
  if (data.length < patternArray.length) {
    return false;
  }
  for (let i = 0; i < patternArray.length; i++) {
    if (data[i] !== patternArray[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Concatenate multiple Uint8Arrays
 */
export function concat(...arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}
