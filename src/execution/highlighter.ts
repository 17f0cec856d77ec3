/**
 * Source highlighting for backtrace source blocks.
 *
 * A SourceHighlighter turns a whole file into one HTML fragment per line.
 * The backtrace cache calls it at most once per (component, file).
 */

import type { BundledLanguage, BundledTheme, createHighlighter, ThemedToken } from 'shiki';

export interface HighlightedLine {
  /** HTML-safe rendering of the line. */
  html: string;
  /** 1-based line number. */
  line: number;
}

export interface SourceHighlighter {
  highlight(content: string, language: string | undefined): HighlightedLine[];
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

function splitLines(content: string): string[] {
  return content.split(/\r?\n/);
}

/** No colors, just escaped text. */
export const plainTextHighlighter: SourceHighlighter = {
  highlight: (content) =>
    splitLines(content).map((text, index) => ({ html: escapeHtml(text), line: index + 1 })),
};

const EXTENSION_LANGUAGES: Record<string, BundledLanguage> = {
  rs: 'rust',
  go: 'go',
  py: 'python',
  js: 'javascript',
  mjs: 'javascript',
  ts: 'typescript',
  c: 'c',
  h: 'c',
  cc: 'cpp',
  cpp: 'cpp',
  hpp: 'cpp',
  java: 'java',
  kt: 'kotlin',
  zig: 'zig',
  wat: 'wasm',
};

/** Language id for a source path, from its extension. */
export function languageFromFile(file: string): string | undefined {
  const base = file.slice(file.lastIndexOf('/') + 1);
  const dot = base.lastIndexOf('.');
  if (dot <= 0) return undefined;
  const extension = base.slice(dot + 1).toLowerCase();
  return EXTENSION_LANGUAGES[extension] ?? extension;
}

// ---------------------------------------------------------------------------
// shiki
// ---------------------------------------------------------------------------

export interface ShikiHighlighterOptions {
  theme?: BundledTheme;
  languages?: BundledLanguage[];
}

const DEFAULT_THEME: BundledTheme = 'github-light';
const DEFAULT_LANGUAGES: BundledLanguage[] = [
  'rust',
  'go',
  'python',
  'javascript',
  'typescript',
  'c',
  'cpp',
];

const FONT_ITALIC = 1;
const FONT_BOLD = 2;
const FONT_UNDERLINE = 4;

/** The part of a shiki `Highlighter` used here. */
export interface ShikiTokenizer {
  getLoadedLanguages(): string[];
  codeToTokens(
    code: string,
    options: { lang: BundledLanguage; theme: BundledTheme },
  ): { tokens: ThemedToken[][] };
}

/** shiki's own `createHighlighter` export. */
export type CreateShikiHighlighter = typeof createHighlighter;

function tokenToHtml(token: ThemedToken): string {
  const styles: string[] = [];
  if (token.color) styles.push(`color:${token.color}`);
  // -1 means "not set".
  const fontStyle = token.fontStyle !== undefined && token.fontStyle > 0 ? token.fontStyle : 0;
  if (fontStyle & FONT_ITALIC) styles.push('font-style:italic');
  if (fontStyle & FONT_BOLD) styles.push('font-weight:bold');
  if (fontStyle & FONT_UNDERLINE) styles.push('text-decoration:underline');
  const text = escapeHtml(token.content);
  return styles.length > 0 ? `<span style="${styles.join(';')}">${text}</span>` : text;
}

function isLoadedLanguage(
  tokenizer: ShikiTokenizer,
  language: string,
): language is BundledLanguage {
  return tokenizer.getLoadedLanguages().includes(language);
}

/** Languages the tokenizer has not loaded fall back to plain text. */
export function shikiSourceHighlighter(
  tokenizer: ShikiTokenizer,
  theme: BundledTheme = DEFAULT_THEME,
): SourceHighlighter {
  return {
    highlight(content, language) {
      if (!language || !isLoadedLanguage(tokenizer, language)) {
        return plainTextHighlighter.highlight(content, language);
      }
      const { tokens } = tokenizer.codeToTokens(content, { lang: language, theme });
      return tokens.map((lineTokens, index) => ({
        html: lineTokens.map(tokenToHtml).join(''),
        line: index + 1,
      }));
    },
  };
}

/**
 * Build a highlighter from shiki's `createHighlighter`.
 *
 * shiki ships ES modules only and this package compiles to CommonJS, so the
 * host imports shiki itself (from its bundled browser build) and passes the
 * function in:
 *
 * ```ts
 * import { createHighlighter } from 'shiki';
 * const highlighter = await createShikiHighlighter(createHighlighter, { theme: 'github-dark' });
 * ```
 */
export async function createShikiHighlighter(
  create: CreateShikiHighlighter,
  options: ShikiHighlighterOptions = {},
): Promise<SourceHighlighter> {
  const theme = options.theme ?? DEFAULT_THEME;
  const highlighter = await create({
    themes: [theme],
    langs: options.languages ?? DEFAULT_LANGUAGES,
  });
  return shikiSourceHighlighter(highlighter, theme);
}
