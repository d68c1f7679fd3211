import xxhash from 'xxhash-wasm';

export type XXHash64 = {
  h64(str: string): bigint;
  h64Raw(bytes: Uint8Array): bigint;
};

// The wasm module is compiled once and shared by every seeded hasher.
let api: ReturnType<typeof xxhash> | undefined;

export async function loadXXHash64(seed = 0n): Promise<XXHash64> {
  api ??= xxhash();
  const {h64, h64Raw} = await api;
  return {
    h64: str => h64(str, seed),
    h64Raw: bytes => h64Raw(bytes, seed),
  };
}
