export const Defaults = {
  INCLUDE_PATTERNS: ['*'],
  IGNORE_FILE_NAMES: ['.gitignore'],
  CLI_MAX_SIZE: '1M',
  TOKENIZER: 'tiktoken' as const,
  TIKTOKEN_ENCODING: 'cl100k_base' as const,
} as const;

export const BINARY_SNIFF_BYTES = 8192;

export const TREE_HEADING = 'DIRECTORY TREE:';
export const FILE_SEPARATOR = '='.repeat(70);
export const FILE_LABEL = 'FILE: ';
export const EMPTY_TREE_PLACEHOLDER = '(no files matched the given include/exclude patterns)';

export const GLYPH_CHILD = '├──';
export const GLYPH_LAST = '└──';
export const GLYPH_PIPE = '│   ';
export const GLYPH_SPACE = '    ';
