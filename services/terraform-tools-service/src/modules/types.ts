/**
 * Module analysis data model. Every value here is produced by one pipeline
 * stage and handed on read-only.
 */

export interface RegistryReference {
  readonly kind: 'registry';
  readonly namespace: string;
  readonly name: string;
  readonly provider: string;
  /** Absent means the latest published version */
  readonly version?: string;
  readonly subdir?: string;
}

export interface UrlReference {
  readonly kind: 'url';
  readonly url: string;
  readonly subdir?: string;
}

export type ModuleReference = RegistryReference | UrlReference;

export interface SnapshotFile {
  /** Posix path relative to the module root */
  readonly path: string;
  readonly content: string;
}

export interface FileSnapshot {
  /** Where the files came from: a URL, registry address or directory */
  readonly source: string;
  /** Resolved version for registry references */
  readonly version?: string;
  /** Sorted by path */
  readonly files: readonly SnapshotFile[];
}

/** Half-open `[start, end)` UTF-8 byte offsets into a file */
export interface ByteRange {
  readonly start: number;
  readonly end: number;
}

export type DeclarationKind =
  | 'resource'
  | 'data'
  | 'variable'
  | 'output'
  | 'provider'
  | 'module'
  | 'locals'
  | 'terraform';

export interface DeclarationBlock {
  readonly kind: DeclarationKind;
  /** First label of two-label blocks (`resource "google_storage_bucket" "b"`) */
  readonly typeName: string | null;
  /** Last label; null for unlabeled blocks such as `terraform {}` */
  readonly instanceName: string | null;
  readonly bodyText: string;
  readonly sourceFile: string;
  /** From the block keyword through the closing brace */
  readonly byteRange: ByteRange;
  /** Between the braces, exclusive */
  readonly bodyRange: ByteRange;
  /** 1-based line of the block keyword */
  readonly line: number;
}

export interface VariableSpec {
  readonly name: string;
  readonly type?: string;
  /** Expression text; undefined when the attribute is absent */
  readonly default?: string;
  readonly description?: string;
  readonly sensitive: boolean;
  readonly required: boolean;
  readonly sourceFile: string;
}

export interface OutputSpec {
  readonly name: string;
  readonly description?: string;
  readonly value?: string;
  readonly sensitive: boolean;
  readonly sourceFile: string;
}

export interface ModuleModel {
  readonly inputs: readonly VariableSpec[];
  readonly outputs: readonly OutputSpec[];
  /** `resource` blocks declared in the module root */
  readonly resources: readonly DeclarationBlock[];
  /** Every top-level block of every .tf file, nested directories included */
  readonly blocks: readonly DeclarationBlock[];
  readonly readmeText: string;
  /** First `# ` heading of the README */
  readonly title?: string;
}

export interface RegistryModuleSummary {
  id: string;
  namespace: string;
  name: string;
  provider: string;
  version: string;
  description: string;
  downloads: number;
  source?: string;
  verified: boolean;
}
