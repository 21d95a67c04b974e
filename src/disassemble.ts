import { OpCode, Program } from './types.js';

const pad = (index: number): string => String(index).padStart(4, '0');

/** One line per opcode; loop opcodes show their jump target. */
export const disassemble = (program: Program): string => {
    const lines: string[] = [];
    for (let i = 0; i < program.length; i++) {
        const slot = program[i];
        if (slot.kind === 'target') {
            lines.push(`${pad(i)}  <target ${slot.index}>`);
            continue;
        }
        const name = OpCode[slot.op];
        const next = program[i + 1];
        if ((slot.op === OpCode.OPEN || slot.op === OpCode.CLOSE) && next?.kind === 'target') {
            lines.push(`${pad(i)}  ${name.padEnd(6)}  -> ${next.index}`);
            i++;
        } else {
            lines.push(`${pad(i)}  ${name}`);
        }
    }
    return lines.join('\n');
};
