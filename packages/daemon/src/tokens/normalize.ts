const SEPARATORS = /[:\-_.\s]/g;

/** Display form of a token id: trimmed and lowercased, separators kept. */
export function canonicalTokenId(id: string): string {
  return id.trim().toLowerCase();
}

/** Lookup key of a token id. `AA:BB:CC`, `aa-bb-cc` and `aabbcc` share one key. */
export function tokenKey(id: string): string {
  return canonicalTokenId(id).replace(SEPARATORS, "");
}
