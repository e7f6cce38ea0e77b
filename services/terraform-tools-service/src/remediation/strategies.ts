/**
 * Remediation strategies, keyed by Checkov check id.
 *
 * A strategy computes one edit relative to a resource block's body text:
 * it never looks at line numbers, so it stays correct however the file is
 * formatted. The ids in this table are the allow-list of checks the engine
 * is trusted to fix.
 */

import { parseStructure } from '../modules/hcl-scanner';
import type { DeclarationBlock } from '../modules/types';

export const STRATEGY_TABLE_VERSION = '1';

/** Google's IAP TCP forwarding range */
export const IAP_SOURCE_RANGE = '35.235.240.0/20';

interface StrategyBase {
  checkId: string;
  /** Resource types the edit is valid for */
  resourceTypes: readonly string[];
  description: string;
}

export interface SetAttributeStrategy extends StrategyBase {
  kind: 'setAttribute';
  attribute: string;
  /** HCL expression */
  value: string;
}

export interface EnsureBlockStrategy extends StrategyBase {
  kind: 'ensureBlock';
  blockType: string;
  /** Attributes the nested block must carry, as HCL expressions */
  attributes: Readonly<Record<string, string>>;
}

export interface ReplaceInListStrategy extends StrategyBase {
  kind: 'replaceInList';
  attribute: string;
  from: string;
  to: string;
}

export type RemediationStrategy = SetAttributeStrategy | EnsureBlockStrategy | ReplaceInListStrategy;

export type StrategyTable = Readonly<Record<string, RemediationStrategy>>;

export const STRATEGIES: StrategyTable = {
  CKV_AWS_3: {
    checkId: 'CKV_AWS_3',
    kind: 'setAttribute',
    resourceTypes: ['aws_ebs_volume'],
    description: 'Encrypt EBS volumes',
    attribute: 'encrypted',
    value: 'true',
  },
  CKV_AWS_16: {
    checkId: 'CKV_AWS_16',
    kind: 'setAttribute',
    resourceTypes: ['aws_db_instance'],
    description: 'Encrypt RDS storage',
    attribute: 'storage_encrypted',
    value: 'true',
  },
  CKV_GCP_2: {
    checkId: 'CKV_GCP_2',
    kind: 'replaceInList',
    resourceTypes: ['google_compute_firewall'],
    description: 'Restrict SSH ingress from 0.0.0.0/0 to the IAP range',
    attribute: 'source_ranges',
    from: '0.0.0.0/0',
    to: IAP_SOURCE_RANGE,
  },
  CKV_GCP_3: {
    checkId: 'CKV_GCP_3',
    kind: 'replaceInList',
    resourceTypes: ['google_compute_firewall'],
    description: 'Restrict RDP ingress from 0.0.0.0/0 to the IAP range',
    attribute: 'source_ranges',
    from: '0.0.0.0/0',
    to: IAP_SOURCE_RANGE,
  },
  CKV_GCP_7: {
    checkId: 'CKV_GCP_7',
    kind: 'setAttribute',
    resourceTypes: ['google_container_cluster'],
    description: 'Disable legacy ABAC on GKE clusters',
    attribute: 'enable_legacy_abac',
    value: 'false',
  },
  CKV_GCP_12: {
    checkId: 'CKV_GCP_12',
    kind: 'ensureBlock',
    resourceTypes: ['google_container_cluster'],
    description: 'Enable GKE network policy',
    blockType: 'network_policy',
    attributes: { enabled: 'true' },
  },
  CKV_GCP_26: {
    checkId: 'CKV_GCP_26',
    kind: 'ensureBlock',
    resourceTypes: ['google_compute_subnetwork'],
    description: 'Enable VPC flow logs on subnetworks',
    blockType: 'log_config',
    attributes: {
      aggregation_interval: '"INTERVAL_10_MIN"',
      flow_sampling: '0.5',
      metadata: '"INCLUDE_ALL_METADATA"',
    },
  },
  CKV_GCP_29: {
    checkId: 'CKV_GCP_29',
    kind: 'setAttribute',
    resourceTypes: ['google_storage_bucket'],
    description: 'Enable uniform bucket-level access',
    attribute: 'uniform_bucket_level_access',
    value: 'true',
  },
  CKV_GCP_39: {
    checkId: 'CKV_GCP_39',
    kind: 'ensureBlock',
    resourceTypes: ['google_compute_instance'],
    description: 'Launch instances with Shielded VM enabled',
    blockType: 'shielded_instance_config',
    attributes: {
      enable_secure_boot: 'true',
      enable_vtpm: 'true',
      enable_integrity_monitoring: 'true',
    },
  },
  CKV_GCP_74: {
    checkId: 'CKV_GCP_74',
    kind: 'setAttribute',
    resourceTypes: ['google_compute_subnetwork'],
    description: 'Enable Private Google Access on subnetworks',
    attribute: 'private_ip_google_access',
    value: 'true',
  },
  CKV_GCP_78: {
    checkId: 'CKV_GCP_78',
    kind: 'ensureBlock',
    resourceTypes: ['google_storage_bucket'],
    description: 'Enable object versioning on buckets',
    blockType: 'versioning',
    attributes: { enabled: 'true' },
  },
  CKV_GCP_114: {
    checkId: 'CKV_GCP_114',
    kind: 'setAttribute',
    resourceTypes: ['google_storage_bucket'],
    description: 'Enforce public access prevention on buckets',
    attribute: 'public_access_prevention',
    value: '"enforced"',
  },
};

/**
 * Ids on the allow-list once operator-disabled checks are removed
 */
export function fixableCheckIds(table: StrategyTable, disabled: Iterable<string> = []): Set<string> {
  const ids = new Set(Object.keys(table));
  for (const id of disabled) ids.delete(id);
  return ids;
}

/** Replacement of `[start, end)` in a block body (UTF-16 indexes) */
export interface BodyEdit {
  start: number;
  end: number;
  text: string;
}

interface BodyContext {
  body: string;
  file: string;
  line: number;
  /** Indentation of the body's statements */
  indent: string;
  /** Indentation of the closing brace */
  closingIndent: string;
  /** Line ending of the surrounding file */
  eol: string;
}

function normalize(expression: string): string {
  return expression.replace(/\s+/g, ' ').trim();
}

function detectIndent(body: string, fallback: string): string {
  const match = /\n([ \t]*)\S/.exec(body);
  return match ? match[1] : fallback;
}

function indentUnit(indent: string): string {
  return indent.startsWith('\t') ? '\t' : '  ';
}

function insertLines(context: BodyContext, lines: readonly string[]): BodyEdit {
  const { body, indent, closingIndent, eol } = context;
  const rendered = lines.map(line => `${indent}${line}${eol}`).join('');
  const lastNewline = body.lastIndexOf('\n');

  if (lastNewline !== -1 && body.slice(lastNewline + 1).trim() === '') {
    return { start: lastNewline + 1, end: lastNewline + 1, text: rendered };
  }
  if (lastNewline !== -1) {
    return { start: body.length, end: body.length, text: `${eol}${rendered}${closingIndent}` };
  }

  // Single-line body: reflow into a multi-line block
  const existing = body.trim();
  return {
    start: 0,
    end: body.length,
    text: `${eol}${existing ? `${indent}${existing}${eol}` : ''}${rendered}${closingIndent}`,
  };
}

function applyEdits(text: string, edits: readonly BodyEdit[]): string {
  return [...edits]
    .sort((a, b) => b.start - a.start)
    .reduce((out, edit) => out.slice(0, edit.start) + edit.text + out.slice(edit.end), text);
}

function setAttributes(context: BodyContext, required: Readonly<Record<string, string>>): BodyEdit | null {
  const { attributes } = parseStructure(context.body, context.file, context.line);
  const edits: BodyEdit[] = [];
  const missing: string[] = [];

  for (const [name, value] of Object.entries(required)) {
    const attribute = attributes.find(candidate => candidate.name === name);
    if (!attribute) {
      missing.push(`${name} = ${value}`);
    } else if (normalize(attribute.expression) !== normalize(value)) {
      edits.push({ start: attribute.valueStart, end: attribute.valueEnd, text: value });
    }
  }
  if (missing.length > 0) {
    edits.push(insertLines(context, missing));
  }

  if (edits.length === 0) return null;
  if (edits.length === 1) return edits[0];
  return { start: 0, end: context.body.length, text: applyEdits(context.body, edits) };
}

function ensureBlock(context: BodyContext, strategy: EnsureBlockStrategy): BodyEdit | null {
  const { blocks } = parseStructure(context.body, context.file, context.line);
  const unit = indentUnit(context.indent);
  const existing = blocks.find(block => block.type === strategy.blockType);

  if (!existing) {
    return insertLines(context, [
      `${strategy.blockType} {`,
      ...Object.entries(strategy.attributes).map(([name, value]) => `${unit}${name} = ${value}`),
      '}',
    ]);
  }

  const offset = existing.openBrace + 1;
  const nestedBody = context.body.slice(offset, existing.closeBrace);
  const edit = setAttributes(
    {
      body: nestedBody,
      file: context.file,
      line: existing.line,
      indent: detectIndent(nestedBody, context.indent + unit),
      closingIndent: context.indent,
      eol: context.eol,
    },
    strategy.attributes
  );
  return edit && { start: edit.start + offset, end: edit.end + offset, text: edit.text };
}

function replaceInList(context: BodyContext, strategy: ReplaceInListStrategy): BodyEdit | null {
  const { attributes } = parseStructure(context.body, context.file, context.line);
  const attribute = attributes.find(candidate => candidate.name === strategy.attribute);
  if (!attribute) return null;

  const from = JSON.stringify(strategy.from);
  if (!attribute.expression.includes(from)) return null;

  return {
    start: attribute.valueStart,
    end: attribute.valueEnd,
    text: attribute.expression.split(from).join(JSON.stringify(strategy.to)),
  };
}

/**
 * The edit that makes `block` comply, or null when it already does
 */
export function planEdit(strategy: RemediationStrategy, block: DeclarationBlock): BodyEdit | null {
  const context: BodyContext = {
    body: block.bodyText,
    file: block.sourceFile,
    line: block.line,
    indent: detectIndent(block.bodyText, '  '),
    closingIndent: '',
    eol: block.bodyText.includes('\r\n') ? '\r\n' : '\n',
  };

  switch (strategy.kind) {
    case 'setAttribute':
      return setAttributes(context, { [strategy.attribute]: strategy.value });
    case 'ensureBlock':
      return ensureBlock(context, strategy);
    case 'replaceInList':
      return replaceInList(context, strategy);
  }
}
