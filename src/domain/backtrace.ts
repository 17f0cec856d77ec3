import type { ComponentId } from './component-id';

export interface FrameSymbol {
  funcName?: string;
  file?: string;
  line?: number;
  col?: number;
}

export interface FrameInfo {
  module: string;
  funcName: string;
  symbols: FrameSymbol[];
}

/**
 * Call stack captured by the runtime. It stays valid for the half-open
 * version range `[versionMinIncluding, versionMaxExcluding)`.
 */
export interface WasmBacktrace {
  versionMinIncluding: number;
  versionMaxExcluding: number;
  frames: FrameInfo[];
}

export interface GetBacktraceResponse {
  componentId: ComponentId;
  wasmBacktrace: WasmBacktrace;
}

export type BacktraceFilter = { type: 'first' } | { type: 'specific'; version: number };

/** `first` for version 0, otherwise the specific version. */
export function backtraceFilterFor(version: number): BacktraceFilter {
  return version > 0 ? { type: 'specific', version } : { type: 'first' };
}
