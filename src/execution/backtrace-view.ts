import type { FrameInfo, FrameSymbol, GetBacktraceResponse } from '../domain/backtrace';
import type { ComponentId } from '../domain/component-id';
import type { HighlightedLine } from './highlighter';

export interface SourceBlockView {
  file: string;
  focusLine: number;
  lines: HighlightedLine[];
}

export interface SymbolView {
  /** `at file:line:col - func`; absent when locations are hidden. */
  location?: string;
  source?: SourceBlockView;
}

export interface FrameView {
  index: number;
  /** `i: module, function: func`; absent when locations are hidden. */
  header?: string;
  symbols: SymbolView[];
}

export interface FrameViewOptions {
  hideFrames: boolean;
  /**
   * `(file, line)` positions already rendered. Shared across all ancestry
   * levels of one render so each position shows its source once.
   */
  seenPositions: Set<string>;
  getHighlightedSource(componentId: ComponentId, file: string): HighlightedLine[] | undefined;
}

export function formatFrameHeader(index: number, frame: FrameInfo): string {
  return `${index}: ${frame.module}, function: ${frame.funcName}`;
}

export function formatSymbolLocation(symbol: FrameSymbol): string {
  const { file, line, col } = symbol;
  if (file !== undefined && line !== undefined && col !== undefined) return `${file}:${line}:${col}`;
  if (file !== undefined && line !== undefined) return `${file}:${line}`;
  if (file !== undefined && col === undefined) return file;
  return 'unknown location';
}

/** The function name is appended only when it differs from the frame's. */
export function formatSymbolLine(symbol: FrameSymbol, frame: FrameInfo): string {
  const line = `at ${formatSymbolLocation(symbol)}`;
  if (symbol.funcName !== undefined && symbol.funcName !== frame.funcName) {
    return `${line} - ${symbol.funcName}`;
  }
  return line;
}

export function computeFrameViews(
  response: GetBacktraceResponse,
  options: FrameViewOptions,
): FrameView[] {
  const { hideFrames, seenPositions } = options;
  return response.wasmBacktrace.frames.map((frame, index) => ({
    index,
    header: hideFrames ? undefined : formatFrameHeader(index, frame),
    symbols: frame.symbols.map((symbol) => {
      const view: SymbolView = {};
      if (!hideFrames) {
        view.location = formatSymbolLine(symbol, frame);
      }
      if (symbol.file !== undefined && symbol.line !== undefined) {
        const position = `${symbol.file}:${symbol.line}`;
        if (!seenPositions.has(position)) {
          seenPositions.add(position);
          const lines = options.getHighlightedSource(response.componentId, symbol.file);
          if (lines) {
            view.source = { file: symbol.file, focusLine: symbol.line, lines };
          }
        }
      }
      return view;
    }),
  }));
}
