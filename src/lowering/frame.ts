import type { ProbeNode } from '../frontend/ast.js';
import { internalError } from '../diagnostics/internal.js';

/**
 * Scratch registers handed out to probe code, in scan order.
 *
 * Registers 6-8 survive helper calls, so values parked there outlive the expressions that made them.
 */
export const SCRATCH_REGISTERS: readonly number[] = [6, 7, 8];

/**
 * `static` values live for the whole probe; `dynamic` values live within one expression.
 */
export type RegisterClass = 'static' | 'dynamic';

/**
 * Per-probe register file split on demand between the two classes.
 *
 * Both classes start with every scratch register available. A register is granted only when
 * neither class has claimed it, and is then removed from the requesting class for good. Once
 * assigned to any class, it is permanently excluded from both. There is no release.
 */
export interface RegisterAllocator {
  /** Claim the first register free in both classes, or `undefined` when the file is exhausted. */
  acquire(cls: RegisterClass): number | undefined;
  /** Registers a further `acquire(cls)` could still return, in scan order. */
  available(cls: RegisterClass): number[];
  /** Availability bitmask of one class (bit `n` set while register `n` is still in its pool). */
  mask(cls: RegisterClass): number;
}

export function createRegisterAllocator(): RegisterAllocator {
  const pools: Record<RegisterClass, Set<number>> = {
    static: new Set(SCRATCH_REGISTERS),
    dynamic: new Set(SCRATCH_REGISTERS),
  };
  const free = (cls: RegisterClass, reg: number): boolean =>
    pools[cls].has(reg) && pools[cls === 'static' ? 'dynamic' : 'static'].has(reg);

  return {
    acquire: (cls) => {
      const reg = SCRATCH_REGISTERS.find((r) => free(cls, r));
      if (reg !== undefined) pools[cls].delete(reg);
      return reg;
    },
    available: (cls) => SCRATCH_REGISTERS.filter((r) => free(cls, r)),
    mask: (cls) => {
      let bits = 0;
      for (const reg of pools[cls]) bits |= 1 << reg;
      return bits;
    },
  };
}

/**
 * Bump allocator for probe-local stack storage. Offsets are negative and only ever decrease.
 */
export interface StackAllocator {
  readonly sp: number;
  /** Reserve `size` bytes below the current offset and return the base of the new region. */
  acquire(size: number): number;
}

export function createStackAllocator(): StackAllocator {
  let offset = 0;
  return {
    get sp() {
      return offset;
    },
    acquire: (size) => {
      if (!Number.isInteger(size) || size <= 0) {
        internalError(`Stack allocation size must be a positive integer (got ${size}).`);
      }
      offset -= size;
      return offset;
    },
  };
}

/**
 * Allocation state for compiling one probe. A fresh frame comes with every probe annotation.
 */
export interface ProbeFrame {
  readonly regs: RegisterAllocator;
  readonly stack: StackAllocator;
}

export function newProbeFrame(): ProbeFrame {
  return { regs: createRegisterAllocator(), stack: createStackAllocator() };
}

export function acquireRegister(probe: ProbeNode, cls: RegisterClass): number | undefined {
  return probe.dyn.frame.regs.acquire(cls);
}

export function acquireStack(probe: ProbeNode, size: number): number {
  return probe.dyn.frame.stack.acquire(size);
}
