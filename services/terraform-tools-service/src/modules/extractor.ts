/**
 * Block Extractor
 *
 * Builds a ModuleModel from a snapshot by scanning each `.tf` file for
 * top-level blocks. Pure and deterministic: the same snapshot always yields
 * a deep-equal model, and any structural error fails the whole extraction.
 */

import { ExtractError } from '../errors';
import { literalValue, parseStructure, utf8Offsets, type AttributeNode } from './hcl-scanner';
import type {
  DeclarationBlock,
  DeclarationKind,
  FileSnapshot,
  ModuleModel,
  OutputSpec,
  SnapshotFile,
  VariableSpec,
} from './types';

const DECLARATION_KINDS: ReadonlySet<string> = new Set<DeclarationKind>([
  'resource',
  'data',
  'variable',
  'output',
  'provider',
  'module',
  'locals',
  'terraform',
]);

function isDeclarationKind(value: string): value is DeclarationKind {
  return DECLARATION_KINDS.has(value);
}

export function isTerraformFile(path: string): boolean {
  return path.endsWith('.tf');
}

export function isRootFile(path: string): boolean {
  return !path.includes('/');
}

/**
 * Top-level declaration blocks of one file, in source order
 */
export function extractBlocks(file: SnapshotFile): DeclarationBlock[] {
  const { content, path } = file;
  const structure = parseStructure(content, path);
  const toBytes = utf8Offsets(content);
  const blocks: DeclarationBlock[] = [];

  for (const node of structure.blocks) {
    if (!isDeclarationKind(node.type)) continue;
    const { labels } = node;
    blocks.push({
      kind: node.type,
      typeName: labels.length >= 2 ? labels[0] : null,
      instanceName: labels.length >= 1 ? labels[labels.length - 1] : null,
      bodyText: content.slice(node.openBrace + 1, node.closeBrace),
      sourceFile: path,
      byteRange: { start: toBytes(node.start), end: toBytes(node.end) },
      bodyRange: { start: toBytes(node.openBrace + 1), end: toBytes(node.closeBrace) },
      line: node.line,
    });
  }
  return blocks;
}

function bodyAttributes(block: DeclarationBlock): Map<string, AttributeNode> {
  const { attributes } = parseStructure(block.bodyText, block.sourceFile, block.line);
  return new Map(attributes.map(attribute => [attribute.name, attribute]));
}

function textAttribute(attributes: Map<string, AttributeNode>, name: string): string | undefined {
  const expression = attributes.get(name)?.expression;
  if (expression === undefined) return undefined;
  return literalValue(expression) ?? expression;
}

function toVariable(block: DeclarationBlock, name: string): VariableSpec {
  const attributes = bodyAttributes(block);
  const defaultValue = attributes.get('default')?.expression;
  return {
    name,
    type: attributes.get('type')?.expression,
    default: defaultValue,
    description: textAttribute(attributes, 'description'),
    sensitive: attributes.get('sensitive')?.expression === 'true',
    required: defaultValue === undefined,
    sourceFile: block.sourceFile,
  };
}

function toOutput(block: DeclarationBlock, name: string): OutputSpec {
  const attributes = bodyAttributes(block);
  return {
    name,
    description: textAttribute(attributes, 'description'),
    value: attributes.get('value')?.expression,
    sensitive: attributes.get('sensitive')?.expression === 'true',
    sourceFile: block.sourceFile,
  };
}

function assertUnique(kind: 'variable' | 'output', blocks: DeclarationBlock[]): void {
  const seen = new Map<string, string[]>();
  for (const block of blocks) {
    const name = block.instanceName ?? '';
    seen.set(name, [...(seen.get(name) ?? []), block.sourceFile]);
  }
  for (const [name, files] of seen) {
    if (files.length > 1) {
      throw ExtractError.duplicateSymbol(`${kind}.${name}`, files);
    }
  }
}

/**
 * First `# ` heading of a markdown document, outside fenced code
 */
export function readmeTitle(markdown: string): string | undefined {
  let inFence = false;
  for (const line of markdown.split(/\r?\n/)) {
    if (/^\s*(```|~~~)/.test(line)) {
      inFence = !inFence;
      continue;
    }
    if (inFence) continue;
    const heading = /^#[ \t]+(.+?)[ \t#]*$/.exec(line);
    if (heading) return heading[1];
  }
  return undefined;
}

export function extract(snapshot: FileSnapshot): ModuleModel {
  const files = [...snapshot.files].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  const blocks = files.filter(file => isTerraformFile(file.path)).flatMap(extractBlocks);
  const root = blocks.filter(block => isRootFile(block.sourceFile));

  const variables = root.filter(block => block.kind === 'variable');
  const outputs = root.filter(block => block.kind === 'output');
  assertUnique('variable', variables);
  assertUnique('output', outputs);

  const readme = files.find(file => isRootFile(file.path) && /^readme(\.md)?$/i.test(file.path));
  const readmeText = readme?.content ?? '';

  return {
    inputs: variables.map(block => toVariable(block, block.instanceName ?? '')),
    outputs: outputs.map(block => toOutput(block, block.instanceName ?? '')),
    resources: root.filter(block => block.kind === 'resource'),
    blocks,
    readmeText,
    title: readmeTitle(readmeText),
  };
}
