import type { Instruction, StreamItem } from './instruction.js';
import { targetLabel } from './instruction.js';

/**
 * Processor status flags.
 */
export interface Flags {
  n: boolean;
  v: boolean;
  d: boolean;
  i: boolean;
  z: boolean;
  c: boolean;
}

export interface MachineState {
  a: number;
  x: number;
  y: number;
  sp: number;
  flags: Flags;
  memory: Uint8Array;
}

export type HaltReason =
  | 'return'
  | 'end'
  | 'jam'
  | 'brk'
  | 'step-limit'
  | 'unresolved-label'
  | 'indirect-jump'
  | 'unsupported';

export interface VolatileWrite {
  address: number;
  value: number;
}

export interface SimulationOptions {
  /** Label to start at; the first item otherwise. */
  entry?: string;
  maxSteps?: number;
  /** Initial state; memory is copied. */
  state?: Partial<MachineState>;
}

export interface SimulationResult {
  state: MachineState;
  halt: HaltReason;
  steps: number;
  /** Writes to volatile locations, in order. */
  volatileWrites: VolatileWrite[];
  /** Absolute `JSR $addr` targets executed as no-ops. */
  externalCalls: number[];
}

export const DEFAULT_MAX_STEPS = 100_000;

export function initialState(): MachineState {
  return {
    a: 0,
    x: 0,
    y: 0,
    sp: 0xff,
    flags: { n: false, v: false, d: false, i: false, z: false, c: false },
    memory: new Uint8Array(0x10000),
  };
}

function statusByte(f: Flags): number {
  return (
    (f.n ? 0x80 : 0) |
    (f.v ? 0x40 : 0) |
    0x20 |
    0x10 |
    (f.d ? 0x08 : 0) |
    (f.i ? 0x04 : 0) |
    (f.z ? 0x02 : 0) |
    (f.c ? 0x01 : 0)
  );
}

function setStatus(f: Flags, value: number): void {
  f.n = (value & 0x80) !== 0;
  f.v = (value & 0x40) !== 0;
  f.d = (value & 0x08) !== 0;
  f.i = (value & 0x04) !== 0;
  f.z = (value & 0x02) !== 0;
  f.c = (value & 0x01) !== 0;
}

/**
 * Executes an instruction stream item by item on a flat 64K memory.
 *
 * Labels stand for their own position in the stream; `JSR` pushes the index of the calling item
 * on the hardware stack in page 1, so stack effects match the real machine. Decimal mode is not
 * modeled. Execution stops on `RTS` with no pending call, `JAM`, `BRK`, running off the end, or
 * the step limit.
 */
export class Simulator {
  readonly state: MachineState;
  private readonly labels = new Map<string, number>();
  private readonly writes: VolatileWrite[] = [];
  private readonly external: number[] = [];
  private calls = 0;

  constructor(
    private readonly items: readonly StreamItem[],
    init: Partial<MachineState> = {},
  ) {
    const base = initialState();
    this.state = {
      ...base,
      ...init,
      flags: { ...base.flags, ...init.flags },
      memory: init.memory ? new Uint8Array(init.memory) : base.memory,
    };
    items.forEach((item, index) => {
      if (item.kind === 'label' && !this.labels.has(item.name)) this.labels.set(item.name, index);
    });
  }

  run(options: Omit<SimulationOptions, 'state'> = {}): SimulationResult {
    const maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
    let pc = 0;
    if (options.entry !== undefined) {
      const start = this.labels.get(options.entry);
      if (start === undefined) return this.result('unresolved-label', 0);
      pc = start;
    }

    let steps = 0;
    for (;;) {
      const item = this.items[pc];
      if (!item) return this.result('end', steps);
      if (item.kind === 'label') {
        pc++;
        continue;
      }
      if (steps >= maxSteps) return this.result('step-limit', steps);
      steps++;
      const next = this.execute(item, pc);
      if (typeof next === 'string') return this.result(next, steps);
      pc = next;
    }
  }

  private result(halt: HaltReason, steps: number): SimulationResult {
    return {
      state: this.state,
      halt,
      steps,
      volatileWrites: [...this.writes],
      externalCalls: [...this.external],
    };
  }

  private read(address: number): number {
    return this.state.memory[address & 0xffff] ?? 0;
  }

  private write(i: Instruction, address: number, value: number): void {
    const v = value & 0xff;
    this.state.memory[address & 0xffff] = v;
    if (i.operand.kind === 'mem' && i.operand.ref.volatile) {
      this.writes.push({ address: address & 0xffff, value: v });
    }
  }

  private push(value: number): void {
    this.state.memory[0x100 + this.state.sp] = value & 0xff;
    this.state.sp = (this.state.sp - 1) & 0xff;
  }

  private pull(): number {
    this.state.sp = (this.state.sp + 1) & 0xff;
    return this.read(0x100 + this.state.sp);
  }

  private nz(value: number): number {
    const v = value & 0xff;
    this.state.flags.n = (v & 0x80) !== 0;
    this.state.flags.z = v === 0;
    return v;
  }

  /** Effective address of a memory operand. */
  private address(i: Instruction): number {
    const base = i.operand.kind === 'mem' ? i.operand.ref.address : 0;
    const { x, y } = this.state;
    switch (i.mode) {
      case 'zpx':
        return (base + x) & 0xff;
      case 'zpy':
        return (base + y) & 0xff;
      case 'absx':
        return (base + x) & 0xffff;
      case 'absy':
        return (base + y) & 0xffff;
      case 'indx': {
        const ptr = (base + x) & 0xff;
        return this.read(ptr) | (this.read((ptr + 1) & 0xff) << 8);
      }
      case 'indy': {
        const at = this.read(base) | (this.read((base + 1) & 0xff) << 8);
        return (at + y) & 0xffff;
      }
      default:
        return base;
    }
  }

  private load(i: Instruction): number {
    if (i.mode === 'imm') return i.operand.kind === 'imm' ? i.operand.value & 0xff : 0;
    if (i.mode === 'acc') return this.state.a;
    return this.read(this.address(i));
  }

  private modify(i: Instruction, fn: (value: number) => number): number {
    if (i.mode === 'acc') {
      this.state.a = fn(this.state.a) & 0xff;
      return this.state.a;
    }
    const at = this.address(i);
    const value = fn(this.read(at)) & 0xff;
    this.write(i, at, value);
    return value;
  }

  private adc(value: number): void {
    const s = this.state;
    const sum = s.a + value + (s.flags.c ? 1 : 0);
    s.flags.c = sum > 0xff;
    s.flags.v = ((s.a ^ sum) & (value ^ sum) & 0x80) !== 0;
    s.a = this.nz(sum);
  }

  private compare(register: number, value: number): void {
    this.state.flags.c = register >= value;
    this.nz(register - value);
  }

  private asl(v: number): number {
    this.state.flags.c = (v & 0x80) !== 0;
    return this.nz(v << 1);
  }

  private lsr(v: number): number {
    this.state.flags.c = (v & 0x01) !== 0;
    return this.nz(v >> 1);
  }

  private rol(v: number): number {
    const carry = this.state.flags.c ? 1 : 0;
    this.state.flags.c = (v & 0x80) !== 0;
    return this.nz((v << 1) | carry);
  }

  private ror(v: number): number {
    const carry = this.state.flags.c ? 0x80 : 0;
    this.state.flags.c = (v & 0x01) !== 0;
    return this.nz((v >> 1) | carry);
  }

  private branch(i: Instruction, pc: number, taken: boolean): number | HaltReason {
    if (!taken) return pc + 1;
    return this.jumpTarget(i);
  }

  private jumpTarget(i: Instruction): number | HaltReason {
    const target = targetLabel(i);
    if (target === undefined) return 'indirect-jump';
    return this.labels.get(target) ?? 'unresolved-label';
  }

  /** Execute one instruction; returns the next item index or why execution stops. */
  private execute(i: Instruction, pc: number): number | HaltReason {
    const s = this.state;
    const f = s.flags;
    switch (i.mnemonic) {
      case 'LDA':
        s.a = this.nz(this.load(i));
        break;
      case 'LDX':
        s.x = this.nz(this.load(i));
        break;
      case 'LDY':
        s.y = this.nz(this.load(i));
        break;
      case 'LAX':
        s.a = s.x = this.nz(this.load(i));
        break;
      case 'STA':
        this.write(i, this.address(i), s.a);
        break;
      case 'STX':
        this.write(i, this.address(i), s.x);
        break;
      case 'STY':
        this.write(i, this.address(i), s.y);
        break;
      case 'SAX':
        this.write(i, this.address(i), s.a & s.x);
        break;
      case 'TAX':
        s.x = this.nz(s.a);
        break;
      case 'TAY':
        s.y = this.nz(s.a);
        break;
      case 'TXA':
        s.a = this.nz(s.x);
        break;
      case 'TYA':
        s.a = this.nz(s.y);
        break;
      case 'TSX':
        s.x = this.nz(s.sp);
        break;
      case 'TXS':
        s.sp = s.x;
        break;
      case 'ADC':
        this.adc(this.load(i));
        break;
      case 'SBC':
        this.adc(this.load(i) ^ 0xff);
        break;
      case 'AND':
        s.a = this.nz(s.a & this.load(i));
        break;
      case 'ORA':
        s.a = this.nz(s.a | this.load(i));
        break;
      case 'EOR':
        s.a = this.nz(s.a ^ this.load(i));
        break;
      case 'BIT': {
        const v = this.load(i);
        f.n = (v & 0x80) !== 0;
        f.v = (v & 0x40) !== 0;
        f.z = (s.a & v) === 0;
        break;
      }
      case 'CMP':
        this.compare(s.a, this.load(i));
        break;
      case 'CPX':
        this.compare(s.x, this.load(i));
        break;
      case 'CPY':
        this.compare(s.y, this.load(i));
        break;
      case 'INC':
        this.modify(i, (v) => this.nz(v + 1));
        break;
      case 'DEC':
        this.modify(i, (v) => this.nz(v - 1));
        break;
      case 'INX':
        s.x = this.nz(s.x + 1);
        break;
      case 'INY':
        s.y = this.nz(s.y + 1);
        break;
      case 'DEX':
        s.x = this.nz(s.x - 1);
        break;
      case 'DEY':
        s.y = this.nz(s.y - 1);
        break;
      case 'ASL':
        this.modify(i, (v) => this.asl(v));
        break;
      case 'LSR':
        this.modify(i, (v) => this.lsr(v));
        break;
      case 'ROL':
        this.modify(i, (v) => this.rol(v));
        break;
      case 'ROR':
        this.modify(i, (v) => this.ror(v));
        break;
      case 'SLO':
        s.a = this.nz(s.a | this.modify(i, (v) => this.asl(v)));
        break;
      case 'RLA':
        s.a = this.nz(s.a & this.modify(i, (v) => this.rol(v)));
        break;
      case 'SRE':
        s.a = this.nz(s.a ^ this.modify(i, (v) => this.lsr(v)));
        break;
      case 'RRA':
        this.adc(this.modify(i, (v) => this.ror(v)));
        break;
      case 'DCP':
        this.compare(s.a, this.modify(i, (v) => v - 1));
        break;
      case 'ISC':
        this.adc(this.modify(i, (v) => v + 1) ^ 0xff);
        break;
      case 'ANC':
        s.a = this.nz(s.a & this.load(i));
        f.c = f.n;
        break;
      case 'ALR':
        s.a = this.lsr(s.a & this.load(i));
        break;
      case 'ARR': {
        const v = s.a & this.load(i);
        s.a = this.nz((v >> 1) | (f.c ? 0x80 : 0));
        f.c = (s.a & 0x40) !== 0;
        f.v = (((s.a >> 6) ^ (s.a >> 5)) & 1) !== 0;
        break;
      }
      case 'SBX': {
        const ax = s.a & s.x;
        const v = this.load(i);
        f.c = ax >= v;
        s.x = this.nz(ax - v);
        break;
      }
      case 'CLC':
        f.c = false;
        break;
      case 'SEC':
        f.c = true;
        break;
      case 'CLD':
        f.d = false;
        break;
      case 'SED':
        f.d = true;
        break;
      case 'CLI':
        f.i = false;
        break;
      case 'SEI':
        f.i = true;
        break;
      case 'CLV':
        f.v = false;
        break;
      case 'PHA':
        this.push(s.a);
        break;
      case 'PLA':
        s.a = this.nz(this.pull());
        break;
      case 'PHP':
        this.push(statusByte(f));
        break;
      case 'PLP':
        setStatus(f, this.pull());
        break;
      case 'NOP':
        break;
      case 'BCC':
        return this.branch(i, pc, !f.c);
      case 'BCS':
        return this.branch(i, pc, f.c);
      case 'BEQ':
        return this.branch(i, pc, f.z);
      case 'BNE':
        return this.branch(i, pc, !f.z);
      case 'BMI':
        return this.branch(i, pc, f.n);
      case 'BPL':
        return this.branch(i, pc, !f.n);
      case 'BVS':
        return this.branch(i, pc, f.v);
      case 'BVC':
        return this.branch(i, pc, !f.v);
      case 'JMP':
        if (i.mode === 'ind') return 'indirect-jump';
        return this.jumpTarget(i);
      case 'JSR': {
        if (i.operand.kind === 'mem') {
          this.external.push(i.operand.ref.address);
          break;
        }
        const to = this.jumpTarget(i);
        if (typeof to === 'string') return to;
        // Caller index, high byte first; RTS resumes after it.
        this.push(pc >> 8);
        this.push(pc);
        this.calls++;
        return to;
      }
      case 'RTS': {
        if (this.calls === 0) return 'return';
        this.calls--;
        const lo = this.pull();
        const hi = this.pull();
        return ((hi << 8) | lo) + 1;
      }
      case 'RTI':
        return 'return';
      case 'BRK':
        return 'brk';
      case 'JAM':
        return 'jam';
      default:
        return 'unsupported';
    }
    return pc + 1;
  }
}

/**
 * Run `items` from `options.entry` (or the first item) on a fresh machine.
 */
export function simulateStream(
  items: readonly StreamItem[],
  options: SimulationOptions = {},
): SimulationResult {
  const { state, ...run } = options;
  return new Simulator(items, state).run(run);
}
