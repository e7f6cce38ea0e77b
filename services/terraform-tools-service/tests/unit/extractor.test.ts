import { describe, expect, test } from 'vitest';
import { ExtractError } from '../../src/errors';
import { extract, extractBlocks, readmeTitle } from '../../src/modules/extractor';
import type { FileSnapshot } from '../../src/modules/types';

const VARIABLES_TF = `variable "region" {
  type        = string
  description = "GCP region"
  default     = "us-central1"
}

variable "project_id" {
  type        = string
  description = <<-EOT
    Project that hosts
    the network.
  EOT
  sensitive   = true
}
`;

const OUTPUTS_TF = `output "network_id" {
  description = "ID of the \${var.name} network"
  value       = google_compute_network.vpc.id
}
`;

const MAIN_TF = `# Réseau principal
resource "google_compute_network" "vpc" {
  name = "x"
}

moved {
  from = google_compute_network.old
  to   = google_compute_network.vpc
}

data "google_project" "current" {}
`;

const snapshot: FileSnapshot = {
  source: 'test',
  files: [
    { path: 'README.md', content: '```\n# not a title\n```\n# Network Module\n\nCreates a VPC.\n' },
    { path: 'main.tf', content: MAIN_TF },
    { path: 'modules/subnets/variables.tf', content: 'variable "region" {}\n' },
    { path: 'outputs.tf', content: OUTPUTS_TF },
    { path: 'variables.tf', content: VARIABLES_TF },
  ],
};

describe('extractBlocks', () => {
  test('should record byte ranges over multi-byte text', () => {
    const blocks = extractBlocks({ path: 'main.tf', content: MAIN_TF });
    const bytes = Buffer.from(MAIN_TF);
    const vpc = blocks[0];

    expect(blocks.map(b => [b.kind, b.typeName, b.instanceName, b.line])).toEqual([
      ['resource', 'google_compute_network', 'vpc', 2],
      ['data', 'google_project', 'current', 11],
    ]);
    expect(vpc?.byteRange.start).toBe(20);
    expect(bytes.subarray(vpc?.byteRange.start, vpc?.byteRange.end).toString()).toBe(
      'resource "google_compute_network" "vpc" {\n  name = "x"\n}'
    );
    expect(bytes.subarray(vpc?.bodyRange.start, vpc?.bodyRange.end).toString()).toBe(vpc?.bodyText);
    expect(vpc?.bodyText).toBe('\n  name = "x"\n');
  });
});

describe('extract', () => {
  test('should describe inputs, outputs and resources of the module root', () => {
    const model = extract(snapshot);

    expect(model.inputs).toEqual([
      {
        name: 'region',
        type: 'string',
        default: '"us-central1"',
        description: 'GCP region',
        sensitive: false,
        required: false,
        sourceFile: 'variables.tf',
      },
      {
        name: 'project_id',
        type: 'string',
        default: undefined,
        description: 'Project that hosts\nthe network.\n',
        sensitive: true,
        required: true,
        sourceFile: 'variables.tf',
      },
    ]);
    expect(model.outputs).toEqual([
      {
        name: 'network_id',
        description: '"ID of the ${var.name} network"',
        value: 'google_compute_network.vpc.id',
        sensitive: false,
        sourceFile: 'outputs.tf',
      },
    ]);
    expect(model.resources.map(r => `${r.typeName}.${r.instanceName}`)).toEqual(['google_compute_network.vpc']);
    expect(model.blocks.map(b => `${b.sourceFile}:${b.kind}`)).toEqual([
      'main.tf:resource',
      'main.tf:data',
      'modules/subnets/variables.tf:variable',
      'outputs.tf:output',
      'variables.tf:variable',
      'variables.tf:variable',
    ]);
    expect(model.title).toBe('Network Module');
  });

  test('should be independent of file order', () => {
    const reversed: FileSnapshot = { ...snapshot, files: [...snapshot.files].reverse() };
    expect(extract(reversed)).toEqual(extract(snapshot));
  });

  test('should reject duplicate variables across files', () => {
    const duplicate: FileSnapshot = {
      source: 'test',
      files: [
        { path: 'variables.tf', content: 'variable "region" {}\n' },
        { path: 'main.tf', content: 'variable "region" {\n  default = "eu"\n}\n' },
      ],
    };

    expect(() => extract(duplicate)).toThrow('Duplicate declaration of variable.region in main.tf, variables.tf');
  });

  test('should fail the whole extraction on a malformed file', () => {
    const broken: FileSnapshot = {
      source: 'test',
      files: [
        { path: 'main.tf', content: MAIN_TF },
        { path: 'network.tf', content: 'resource "google_compute_network" "x" {\n' },
      ],
    };

    expect(() => extract(broken)).toThrow(ExtractError);
  });

  test('should produce an empty model for a snapshot without Terraform files', () => {
    const model = extract({ source: 'test', files: [{ path: 'README.md', content: 'No heading' }] });
    expect(model).toEqual({
      inputs: [],
      outputs: [],
      resources: [],
      blocks: [],
      readmeText: 'No heading',
      title: undefined,
    });
  });
});

describe('readmeTitle', () => {
  test('should strip closing hashes', () => {
    expect(readmeTitle('# Storage ##\n')).toBe('Storage');
    expect(readmeTitle('## Not top level\n')).toBeUndefined();
  });
});
