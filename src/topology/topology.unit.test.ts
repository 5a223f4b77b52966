import { describe, expect, it } from 'vitest';
import { correlateTopology, MissingGenerationPolicy } from './correlate.js';
import { buildSubnetsFromUpload, UPLOADED_SUBNET_TYPE } from './upload.js';
import { recountSubnet } from './recount.js';
import { allOf, defaultRealSubnetFilter, excludeSubnetIds, minNodeCount } from './filters.js';
import { makeTopologySubnet, makeUploadedNode } from './testHelpers.js';
import { ErrorCode, Generation } from '../types/enums.js';
import { UNASSIGNED_SUBNET_ID } from '../types/topology.js';

describe('correlateTopology', () => {
  it('joins topology with generations and counts per subnet', () => {
    const topology = { subnets: [makeTopologySubnet('sn-1', ['n1', 'n2']), makeTopologySubnet('sn-2', ['n3'])] };
    const generations = new Map([
      ['n1', Generation.GEN1],
      ['n2', Generation.GEN2],
      ['n3', Generation.UNKNOWN]
    ]);
    const result = correlateTopology(topology, generations);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const [first, second] = result.value.subnets;
    expect(first).toMatchObject({ id: 'sn-1', nodeCount: 2, gen1Count: 1, gen2Count: 1, unknownCount: 0 });
    expect(first.nodes.map((node) => node.generation)).toEqual([Generation.GEN1, Generation.GEN2]);
    expect(second).toMatchObject({ id: 'sn-2', nodeCount: 1, gen1Count: 0, gen2Count: 0, unknownCount: 1 });
    expect(result.value.totals).toEqual({ nodeCount: 3, gen1Count: 1, gen2Count: 1, unknownCount: 1 });
    expect(result.value.fallbackCount).toBe(0);
  });

  it('defaults missing nodes to Gen1', () => {
    const topology = { subnets: [makeTopologySubnet('sn-1', ['n1', 'missing'])] };
    const result = correlateTopology(topology, new Map([['n1', Generation.GEN2]]));
    if (!result.ok) throw new Error('expected ok');
    expect(result.value.subnets[0]).toMatchObject({ gen1Count: 1, gen2Count: 1, unknownCount: 0 });
    expect(result.value.fallbackCount).toBe(1);
  });

  it('can default missing nodes to Unknown', () => {
    const topology = { subnets: [makeTopologySubnet('sn-1', ['n1', 'missing'])] };
    const result = correlateTopology(topology, new Map([['n1', Generation.GEN2]]), {
      fallbackGeneration: MissingGenerationPolicy.UNKNOWN
    });
    if (!result.ok) throw new Error('expected ok');
    expect(result.value.subnets[0]).toMatchObject({ gen1Count: 0, gen2Count: 1, unknownCount: 1 });
  });

  it('fails the whole step on a duplicate subnet', () => {
    const topology = { subnets: [makeTopologySubnet('sn-1', ['n1']), makeTopologySubnet('sn-1', ['n2'])] };
    const result = correlateTopology(topology, new Map());
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(ErrorCode.CORRELATION);
    expect(result.error.message).toBe('Topology lists subnet sn-1 more than once');
  });

  it('rejects an empty subnet id', () => {
    const result = correlateTopology({ subnets: [makeTopologySubnet('', ['n1'])] }, new Map());
    expect(result.ok).toBe(false);
  });
});

describe('buildSubnetsFromUpload', () => {
  it('drops records without a subnet and classifies by exact tag', () => {
    const grouping = buildSubnetsFromUpload([
      makeUploadedNode('n1', 'sn-a', 'Gen1'),
      makeUploadedNode('n2', '', 'Gen2'),
      makeUploadedNode('n3', 'sn-b', 'Gen2'),
      makeUploadedNode('n4', 'sn-a', 'Type3')
    ]);
    expect(grouping.droppedCount).toBe(1);
    expect(grouping.subnets.map((subnet) => subnet.id)).toEqual(['sn-a', 'sn-b']);
    expect(grouping.subnets[0]).toMatchObject({
      type: UPLOADED_SUBNET_TYPE,
      nodeCount: 2,
      gen1Count: 1,
      gen2Count: 0,
      unknownCount: 1
    });
    expect(grouping.subnets[0].nodes[0]).toEqual({
      id: 'n1',
      generation: Generation.GEN1,
      operatorId: 'op-1',
      providerId: 'np-1',
      datacenterId: 'dc-1',
      region: 'europe,ch',
      status: 'UP'
    });
  });
});

describe('recountSubnet', () => {
  it('derives counts from the node list', () => {
    const record = recountSubnet({
      id: 'sn-1',
      type: 'system',
      nodes: [
        { id: 'a', generation: Generation.GEN2, operatorId: '', providerId: '', datacenterId: '', region: '', status: '' },
        { id: 'b', generation: Generation.UNKNOWN, operatorId: '', providerId: '', datacenterId: '', region: '', status: '' }
      ]
    });
    expect(record.nodeCount).toBe(record.nodes.length);
    expect(record.gen1Count + record.gen2Count + record.unknownCount).toBe(record.nodeCount);
    expect(record).toMatchObject({ gen1Count: 0, gen2Count: 1, unknownCount: 1 });
  });
});

describe('subnet filters', () => {
  const subnet = (id: string, nodeCount: number) => ({
    id,
    type: 'application',
    nodeCount,
    gen1Count: nodeCount,
    gen2Count: 0,
    unknownCount: 0,
    nodes: []
  });

  it('excludes the unassigned bucket by default', () => {
    expect(defaultRealSubnetFilter(subnet(UNASSIGNED_SUBNET_ID, 4))).toBe(false);
    expect(defaultRealSubnetFilter(subnet('sn-1', 4))).toBe(true);
  });

  it('combines predicates', () => {
    const filter = allOf(excludeSubnetIds(['boundary']), minNodeCount(4));
    expect(filter(subnet('sn-1', 4))).toBe(true);
    expect(filter(subnet('sn-1', 3))).toBe(false);
    expect(filter(subnet('boundary', 13))).toBe(false);
  });
});
