import { describe, it, expect } from 'vitest';
import { parseArgs } from '../src/args.js';

describe('parseArgs', () => {
  it('fills in defaults', () => {
    expect(parseArgs(['prog.bf'])).toEqual({
      dispatch: 'switch',
      tapeSize: 30000,
      showTime: false,
      trace: false,
      dump: false,
      help: false,
      files: ['prog.bf'],
    });
  });

  it('reads every flag', () => {
    expect(parseArgs(['-d', 'closure', '--tape-size', '100', '-t', '--trace', '--dump', 'a.bf', 'b.bf'])).toEqual({
      dispatch: 'closure',
      tapeSize: 100,
      showTime: true,
      trace: true,
      dump: true,
      help: false,
      files: ['a.bf', 'b.bf'],
    });
  });

  it('rejects an unknown dispatch mode', () => {
    expect(() => parseArgs(['--dispatch', 'goto'])).toThrow('Invalid dispatch mode. Use one of: switch, table, closure, aot');
    expect(() => parseArgs(['--dispatch'])).toThrow('Invalid dispatch mode');
  });

  it('rejects a bad tape size', () => {
    expect(() => parseArgs(['--tape-size', '0'])).toThrow('Tape size must be a positive integer');
    expect(() => parseArgs(['--tape-size', '1.5'])).toThrow('Tape size must be a positive integer');
  });

  it('rejects unknown options', () => {
    expect(() => parseArgs(['--fast'])).toThrow('Unknown option: --fast');
  });

  it('recognises help', () => {
    expect(parseArgs(['-h']).help).toBe(true);
  });
});
