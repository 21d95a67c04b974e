import { DispatchMode } from '../types.js';
import { aotDispatch } from './aot.js';
import { closureDispatch } from './closure.js';
import { switchDispatch } from './switch.js';
import { tableDispatch } from './table.js';
import { DispatchStrategy } from './types.js';

export type { DispatchStrategy, Machine } from './types.js';

const strategies: Record<DispatchMode, DispatchStrategy> = {
  switch: switchDispatch,
  table: tableDispatch,
  closure: closureDispatch,
  aot: aotDispatch,
};

export const getDispatch = (mode: DispatchMode): DispatchStrategy => strategies[mode];
