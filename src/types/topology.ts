import type { NodeId, SubnetId } from './ids.js';
import { Generation } from './enums.js';

export interface NodeRecord {
  id: NodeId;
  generation: Generation;
  operatorId: string;
  providerId: string;
  datacenterId: string;
  region: string;
  status: string;
}

export interface SubnetRecord {
  id: SubnetId;
  type: string;
  nodeCount: number;
  gen1Count: number;
  gen2Count: number;
  unknownCount: number;
  nodes: NodeRecord[];
}

export interface UploadedNodeRecord {
  node_id: string;
  node_hardware_generation: string;
  node_operator_id: string;
  node_provider_id: string;
  dc_id: string;
  region: string;
  status: string;
  subnet_id: string;
}

export type NodeDetails = Omit<NodeRecord, 'id' | 'generation'>;

export interface TopologyNode extends NodeDetails {
  id: NodeId;
}

export interface TopologySubnet {
  id: SubnetId;
  type: string;
  nodes: TopologyNode[];
}

export interface TopologyDataset {
  subnets: TopologySubnet[];
}

export type GenerationMap = ReadonlyMap<NodeId, Generation>;

export const UNASSIGNED_SUBNET_ID: SubnetId = 'unassigned';
export const UNASSIGNED_SUBNET_TYPE = 'unassigned';
