export enum AlphabetKind {
  BYTE = "byte",
  BIT_POPULATION = "bit-population",
}

export interface SymbolAlphabet {
  kind: AlphabetKind;
  size: number;
  symbolOf(byte: number): number;
}

export function popcount(byte: number): number {
  let v = byte - ((byte >> 1) & 0x55);
  v = (v & 0x33) + ((v >> 2) & 0x33);
  return (v + (v >> 4)) & 0x0f;
}

export const BYTE_ALPHABET: SymbolAlphabet = {
  kind: AlphabetKind.BYTE,
  size: 256,
  symbolOf: (byte) => byte,
};

export const BIT_POPULATION_ALPHABET: SymbolAlphabet = {
  kind: AlphabetKind.BIT_POPULATION,
  size: 9,
  symbolOf: popcount,
};

export function getAlphabet(kind: AlphabetKind): SymbolAlphabet {
  return kind === AlphabetKind.BIT_POPULATION
    ? BIT_POPULATION_ALPHABET
    : BYTE_ALPHABET;
}
