/**
 * Language detection and syntax highlighting for the text viewer.
 * Uses the emphasize package for ANSI terminal colors.
 */

import { createEmphasize } from 'emphasize';
import { common } from 'lowlight';
import languages from './languages.json' with { type: 'json' };

// Create emphasize instance with common languages
const emphasize = createEmphasize(common);

// File extensions and special filenames mapped to highlight.js language names
const EXTENSION_TO_LANGUAGE: Readonly<Record<string, string>> = languages.extensions;
const FILENAME_TO_LANGUAGE: Readonly<Record<string, string>> = languages.filenames;

// Cache of available languages
let availableLanguages: Set<string> | null = null;

function getAvailableLanguages(): Set<string> {
  if (!availableLanguages) {
    availableLanguages = new Set(emphasize.listLanguages());
  }
  return availableLanguages;
}

function lookup(table: Readonly<Record<string, string>>, key: string): string | null {
  return Object.hasOwn(table, key) ? table[key] : null;
}

/**
 * Get the highlight.js language name from a file path.
 * Returns null if the language cannot be determined or is not supported.
 */
export function getLanguageFromPath(filePath: string): string | null {
  if (!filePath) return null;

  // Check special filenames first
  const filename = filePath.split('/').pop() ?? '';
  const byName = lookup(FILENAME_TO_LANGUAGE, filename);
  if (byName) {
    return getAvailableLanguages().has(byName) ? byName : null;
  }

  const ext = filename.includes('.') ? filename.split('.').pop()?.toLowerCase() : null;
  if (!ext) return null;

  const lang = lookup(EXTENSION_TO_LANGUAGE, ext);
  if (!lang) return null;

  // Verify language is available
  return getAvailableLanguages().has(lang) ? lang : null;
}

/**
 * Highlight multiple lines as a block, preserving multi-line context
 * (e.g., block comments, multi-line strings).
 * Returns one highlighted string per input line, or the input unchanged
 * when highlighting fails.
 */
export function highlightBlock(lines: readonly string[], language: string): string[] {
  if (!language || lines.length === 0) return [...lines];

  let highlighted: string[];
  try {
    highlighted = emphasize.highlight(language, lines.join('\n')).value.split('\n');
  } catch {
    return [...lines];
  }
  return highlighted.length === lines.length ? highlighted : [...lines];
}
