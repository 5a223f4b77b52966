import { classifyWith } from '../classify/classifier.js';
import type { JsonValue } from '../json/document.js';
import { asArray, asString, getField, stringField } from '../json/document.js';
import { ErrorCode, Generation, GenerationRule } from '../types/enums.js';
import { serviceError } from '../types/error.js';
import type { NodeId } from '../types/ids.js';
import type { Result } from '../types/result.js';
import { err, ok } from '../types/result.js';
import type { TopologyDataset, TopologyNode, TopologySubnet } from '../types/topology.js';
import { UNASSIGNED_SUBNET_ID, UNASSIGNED_SUBNET_TYPE } from '../types/topology.js';

export const DEFAULT_SUBNET_TYPE = 'unknown';
export interface HardwareLabelField {
  field: string;
  rule: GenerationRule;
}

// Tried in order; the first string field present decides, classified by its own rule.
export const DEFAULT_HARDWARE_LABELS: readonly HardwareLabelField[] = [
  { field: 'node_reward_type', rule: GenerationRule.REWARD_TYPE },
  { field: 'node_hardware_generation', rule: GenerationRule.TAG },
  { field: 'chip_id', rule: GenerationRule.REWARD_TYPE }
];

function parseError(message: string) {
  return err(serviceError(ErrorCode.PARSE, message));
}

function parseNode(entry: JsonValue): TopologyNode | undefined {
  const bare = asString(entry);
  if (bare !== undefined) {
    return bare.length === 0
      ? undefined
      : { id: bare, operatorId: '', providerId: '', datacenterId: '', region: '', status: '' };
  }
  const id = stringField(entry, 'node_id');
  if (id === undefined || id.length === 0) return undefined;
  return {
    id,
    operatorId: stringField(entry, 'node_operator_id') ?? '',
    providerId: stringField(entry, 'node_provider_id') ?? '',
    datacenterId: stringField(entry, 'dc_id') ?? '',
    region: stringField(entry, 'region') ?? '',
    status: stringField(entry, 'status') ?? ''
  };
}

function parseNodeList(items: readonly JsonValue[], where: string): Result<TopologyNode[]> {
  const nodes: TopologyNode[] = [];
  for (let i = 0; i < items.length; i += 1) {
    const node = parseNode(items[i]);
    if (!node) {
      return parseError(`Topology node ${i} of ${where} has no node_id`);
    }
    nodes.push(node);
  }
  return ok(nodes);
}

export function parseTopologyDocument(doc: JsonValue): Result<TopologyDataset> {
  const entries = asArray(getField(doc, 'subnets'));
  if (!entries) {
    return parseError("Topology response has no 'subnets' array");
  }
  const subnets: TopologySubnet[] = [];
  for (let i = 0; i < entries.length; i += 1) {
    const entry = entries[i];
    const id = stringField(entry, 'subnet_id');
    if (id === undefined || id.length === 0) {
      return parseError(`Topology subnet ${i} has no subnet_id`);
    }
    const items = asArray(getField(entry, 'nodes'));
    if (!items) {
      return parseError(`Topology subnet ${id} has no 'nodes' array`);
    }
    const nodes = parseNodeList(items, id);
    if (!nodes.ok) return nodes;
    subnets.push({ id, type: stringField(entry, 'subnet_type') ?? DEFAULT_SUBNET_TYPE, nodes: nodes.value });
  }

  const unassignedField = getField(doc, 'unassigned_nodes');
  if (unassignedField !== undefined && unassignedField.kind !== 'null') {
    const items = asArray(unassignedField);
    if (!items) {
      return parseError("Topology field 'unassigned_nodes' is not an array");
    }
    const nodes = parseNodeList(items, UNASSIGNED_SUBNET_ID);
    if (!nodes.ok) return nodes;
    subnets.push({ id: UNASSIGNED_SUBNET_ID, type: UNASSIGNED_SUBNET_TYPE, nodes: nodes.value });
  }

  return ok({ subnets });
}

function classifyNode(entry: JsonValue, labels: readonly HardwareLabelField[]): Generation {
  for (const { field, rule } of labels) {
    const label = stringField(entry, field);
    if (label !== undefined) return classifyWith(rule, label);
  }
  return Generation.UNKNOWN;
}

export function parseHardwareDocument(
  doc: JsonValue,
  labels: readonly HardwareLabelField[] = DEFAULT_HARDWARE_LABELS
): Result<Map<NodeId, Generation>> {
  const entries = asArray(getField(doc, 'nodes'));
  if (!entries) {
    return parseError("Hardware response has no 'nodes' array");
  }
  const generations = new Map<NodeId, Generation>();
  for (let i = 0; i < entries.length; i += 1) {
    const id = stringField(entries[i], 'node_id');
    if (id === undefined || id.length === 0) {
      return parseError(`Hardware node ${i} has no node_id`);
    }
    generations.set(id, classifyNode(entries[i], labels));
  }
  return ok(generations);
}
