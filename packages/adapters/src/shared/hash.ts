/**
 * 32-bit string hash (`h = 31 * h + c`). Used to derive `hashCode()` from the
 * canonical keys of markers and descriptors, so equal keys hash equally.
 */
export function hashString(value: string): number {
  let hash = 0;
  for (let i = 0; i < value.length; i += 1) {
    hash = (Math.imul(31, hash) + value.charCodeAt(i)) | 0;
  }
  return hash;
}
