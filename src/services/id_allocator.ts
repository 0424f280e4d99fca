// Room code allocator
// Derives a short numeric code from a conference identifier with FNV-1a 64-bit hashing
// and resolves collisions by probing successive offsets. Performs no I/O: the caller
// supplies the "is this code taken" check.

import { AllocationExhaustedError } from "../models/errors.ts";
import { DEFAULT_ID_LENGTH, MAX_ID_LENGTH } from "../models/mapping.ts";

// FNV-1a 64-bit constants (using BigInt for intermediate math)
const FNV_OFFSET = 0xcbf29ce484222325n;
const FNV_PRIME = 0x100000001b3n;

const encoder = new TextEncoder();

export interface AllocationResult {
  code: number; // Positive, at most idLength digits
  offset: number; // Probe offset that produced the code
  collisions: number; // Candidates rejected because they were already taken
}

export interface CodeAllocatorOptions {
  idLength?: number; // Decimal digits per code (default 5)
  maxProbes?: number; // Offsets tried before giving up (default 10^idLength, the whole space)
}

export type CodeTakenCheck = (code: number) => boolean;

/** FNV-1a 64-bit over the UTF-8 bytes of the identifier. */
export function hashIdentifier(identifier: string): bigint {
  let hash = FNV_OFFSET;
  for (const byte of encoder.encode(identifier)) {
    hash ^= BigInt(byte);
    hash = BigInt.asUintN(64, hash * FNV_PRIME);
  }
  return hash;
}

/** Last `idLength` decimal digits of hash(identifier) + offset. May be 0. */
export function deriveCode(identifier: string, offset: number, idLength: number = DEFAULT_ID_LENGTH): number {
  const modulus = 10n ** BigInt(idLength);
  return Number((hashIdentifier(identifier) + BigInt(offset)) % modulus);
}

export class CodeAllocator {
  readonly idLength: number;
  readonly maxProbes: number;
  private allocations = 0;
  private collisions = 0;
  private exhaustions = 0;

  constructor(opts: CodeAllocatorOptions = {}) {
    const idLength = opts.idLength ?? DEFAULT_ID_LENGTH;
    if (!Number.isInteger(idLength) || idLength < 1 || idLength > MAX_ID_LENGTH) {
      throw new RangeError(`idLength must be an integer between 1 and ${MAX_ID_LENGTH}, got ${idLength}`);
    }
    const maxProbes = opts.maxProbes ?? 10 ** idLength;
    if (!Number.isSafeInteger(maxProbes) || maxProbes < 1) {
      throw new RangeError(`maxProbes must be a positive integer, got ${maxProbes}`);
    }
    this.idLength = idLength;
    this.maxProbes = maxProbes;
  }

  derive(identifier: string, offset: number): number {
    return deriveCode(identifier, offset, this.idLength);
  }

  /** First free candidate for the identifier, probing offsets 0, 1, 2, ... */
  allocate(identifier: string, isTaken: CodeTakenCheck): AllocationResult {
    let collisions = 0;
    for (let offset = 0; offset < this.maxProbes; offset++) {
      const code = this.derive(identifier, offset);
      if (code === 0) continue; // codes are positive
      if (isTaken(code)) {
        collisions++;
        continue;
      }
      this.allocations++;
      this.collisions += collisions;
      return { code, offset, collisions };
    }

    this.collisions += collisions;
    this.exhaustions++;
    throw new AllocationExhaustedError(identifier, this.maxProbes);
  }

  /** Stats snapshot for metrics publication */
  stats(): { allocations: number; collisions: number; exhaustions: number } {
    return {
      allocations: this.allocations,
      collisions: this.collisions,
      exhaustions: this.exhaustions,
    };
  }
}

export default CodeAllocator;
