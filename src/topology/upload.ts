import { classifyGenerationTag } from '../classify/classifier.js';
import type { SubnetId } from '../types/ids.js';
import type { NodeRecord, SubnetRecord, UploadedNodeRecord } from '../types/topology.js';
import { recountSubnet } from './recount.js';

export const UPLOADED_SUBNET_TYPE = 'unknown';

export interface UploadGrouping {
  subnets: SubnetRecord[];
  droppedCount: number;
}

export function buildSubnetsFromUpload(records: readonly UploadedNodeRecord[]): UploadGrouping {
  const grouped = new Map<SubnetId, NodeRecord[]>();
  let droppedCount = 0;
  for (const record of records) {
    if (record.subnet_id.length === 0) {
      droppedCount += 1;
      continue;
    }
    let nodes = grouped.get(record.subnet_id);
    if (!nodes) {
      nodes = [];
      grouped.set(record.subnet_id, nodes);
    }
    nodes.push({
      id: record.node_id,
      generation: classifyGenerationTag(record.node_hardware_generation),
      operatorId: record.node_operator_id,
      providerId: record.node_provider_id,
      datacenterId: record.dc_id,
      region: record.region,
      status: record.status
    });
  }
  const subnets = [...grouped].map(([id, nodes]) => recountSubnet({ id, type: UPLOADED_SUBNET_TYPE, nodes }));
  return { subnets, droppedCount };
}
