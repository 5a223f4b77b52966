import type { Generation } from '../types/enums.js';
import type { NodeDetails, SubnetRecord, TopologyNode, TopologySubnet, UploadedNodeRecord } from '../types/topology.js';
import { recountSubnet } from './recount.js';

const EMPTY_DETAILS: NodeDetails = { operatorId: '', providerId: '', datacenterId: '', region: '', status: '' };

export function makeTopologyNode(id: string, details: Partial<NodeDetails> = {}): TopologyNode {
  return { id, ...EMPTY_DETAILS, ...details };
}

export function makeTopologySubnet(id: string, nodeIds: string[], type = 'application'): TopologySubnet {
  return { id, type, nodes: nodeIds.map((nodeId) => makeTopologyNode(nodeId)) };
}

export function makeUploadedNode(nodeId: string, subnetId: string, generation = 'Gen1'): UploadedNodeRecord {
  return {
    node_id: nodeId,
    node_hardware_generation: generation,
    node_operator_id: 'op-1',
    node_provider_id: 'np-1',
    dc_id: 'dc-1',
    region: 'europe,ch',
    status: 'UP',
    subnet_id: subnetId
  };
}

export function makeSubnetRecord(id: string, generations: Generation[], type = 'application'): SubnetRecord {
  return recountSubnet({
    id,
    type,
    nodes: generations.map((generation, index) => ({ id: `${id}-n${index + 1}`, generation, ...EMPTY_DETAILS }))
  });
}
