import type { SubnetId } from '../types/ids.js';
import type { SubnetRecord } from '../types/topology.js';
import { UNASSIGNED_SUBNET_ID } from '../types/topology.js';

export type SubnetFilter = (subnet: SubnetRecord) => boolean;

export function excludeSubnetIds(ids: Iterable<SubnetId>): SubnetFilter {
  const excluded = new Set(ids);
  return (subnet) => !excluded.has(subnet.id);
}

export function minNodeCount(min: number): SubnetFilter {
  return (subnet) => subnet.nodeCount >= min;
}

export function allOf(...filters: SubnetFilter[]): SubnetFilter {
  return (subnet) => filters.every((filter) => filter(subnet));
}

export const includeAllSubnets: SubnetFilter = () => true;

export const defaultRealSubnetFilter: SubnetFilter = excludeSubnetIds([UNASSIGNED_SUBNET_ID]);
