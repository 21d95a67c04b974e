export class VmError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'VmError';
  }
}

export type MalformedReason = 'unmatched-close' | 'unmatched-open' | 'invalid-program';

export class MalformedProgramError extends VmError {
  constructor(
    public readonly reason: MalformedReason,
    public readonly position: number,
    detail?: string
  ) {
    super(MalformedProgramError.describe(reason, position, detail));
    this.name = 'MalformedProgramError';
  }

  private static describe(reason: MalformedReason, position: number, detail?: string): string {
    switch (reason) {
      case 'unmatched-close':
        return `Unmatched ']' at offset ${position}`;
      case 'unmatched-open':
        return `Unmatched '[' at offset ${position}`;
      case 'invalid-program':
        return `Invalid program at instruction ${position}${detail ? `: ${detail}` : ''}`;
    }
  }
}

export class OutOfBoundsTapeError extends VmError {
  constructor(public readonly cursor: number, public readonly size: number) {
    super(`Tape cursor moved to ${cursor}, outside [0, ${size - 1}]`);
    this.name = 'OutOfBoundsTapeError';
  }
}

export class EngineBusyError extends VmError {
  constructor() {
    super('Engine is already running a program');
    this.name = 'EngineBusyError';
  }
}
