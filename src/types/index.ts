export type TokenizerKind = 'tiktoken' | 'whitespace';

export interface IngestOptions {
  inputPath: string;
  outputPath: string;
  includePatterns?: readonly string[] | undefined;
  excludePatterns?: readonly string[] | undefined;
  respectIgnoreFiles?: boolean | undefined;
  ignoreFileNames?: readonly string[] | undefined;
  maxFileSizeBytes?: number | undefined;
  skipBinaryFiles?: boolean | undefined;
}

export interface IngestConfig {
  readonly inputPath: string;
  readonly outputPath: string;
  readonly includePatterns: readonly string[];
  readonly excludePatterns: readonly string[];
  readonly respectIgnoreFiles: boolean;
  readonly ignoreFileNames: readonly string[];
  readonly maxFileSizeBytes?: number | undefined;
  readonly skipBinaryFiles: boolean;
}

export interface FileEntry {
  absolutePath: string;
  /** Forward-slash path relative to the ingest root; the file name for a single-file root. */
  relativePath: string;
}

export interface DirectoryNode {
  kind: 'directory';
  name: string;
  children: Map<string, TreeNode>;
}

export interface FileNode {
  kind: 'file';
  name: string;
}

export type TreeNode = DirectoryNode | FileNode;

export interface ReadFailure {
  file: string;
  message: string;
}

export interface IngestResult {
  outputPath: string;
  isDirectory: boolean;
  files: string[];
  fileLineCounts: Record<string, number>;
  tokenCount: number;
  readFailures: ReadFailure[];
}

export type SkipReason =
  | 'excluded'
  | 'ignored'
  | 'ignore-file'
  | 'output-artifact'
  | 'too-large'
  | 'binary'
  | 'not-included'
  | 'unreadable';

export type FilterResult =
  | { passes: true }
  | { passes: false; reason: SkipReason; detail: string };
