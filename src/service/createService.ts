import type { ServiceConfig } from '../config/config.js';
import type { CertificationHost } from '../certify/CertificationHost.js';
import { LocalCertificationHost } from '../certify/LocalCertificationHost.js';
import { unlimitedBudget } from '../fetch/budget.js';
import { FetchHttpTransport } from '../fetch/FetchHttpTransport.js';
import { FetchPipeline } from '../fetch/FetchPipeline.js';
import type { HttpTransport, ResourceBudget } from '../fetch/types.js';
import { MemoryStateStore } from '../store/memory/MemoryStateStore.js';
import { SqliteStateStore } from '../store/sqlite/SqliteStateStore.js';
import type { StateStore } from '../store/StateStore.js';
import type { SubnetFilter } from '../topology/filters.js';
import { allOf, excludeSubnetIds, minNodeCount } from '../topology/filters.js';
import type { Nanos } from '../types/ids.js';
import type { Logger } from '../utils/logger.js';
import { createLogger } from '../utils/logger.js';
import { secondsToNanos } from '../utils/time.js';
import { SubnetCensusService } from './SubnetCensusService.js';

export interface ServiceOverrides {
  transport?: HttpTransport;
  budget?: ResourceBudget;
  host?: CertificationHost;
  stateStore?: StateStore;
  now?: () => Nanos;
  logger?: Logger;
}

export function realSubnetFilterFromConfig(stats: ServiceConfig['stats']): SubnetFilter {
  const excluded = excludeSubnetIds(stats.sentinelSubnetIds);
  return stats.minRealSubnetNodes > 0 ? allOf(excluded, minNodeCount(stats.minRealSubnetNodes)) : excluded;
}

export function createSubnetCensusService(
  config: ServiceConfig,
  overrides: ServiceOverrides = {}
): SubnetCensusService {
  const logger = overrides.logger ?? createLogger('subnet-census');
  const pipeline = new FetchPipeline({
    topologyUrl: config.endpoints.topologyUrl,
    hardwareUrl: config.endpoints.hardwareUrl,
    transport: overrides.transport ?? new FetchHttpTransport(),
    budget: overrides.budget ?? unlimitedBudget,
    budgetFloor: config.fetch.budgetFloor,
    maxResponseBytes: config.fetch.maxResponseBytes,
    hardwareLabels: config.fetch.hardwareLabels,
    logger: logger.child({ component: 'fetch' })
  });
  const stateStore =
    overrides.stateStore ??
    (config.persistence.sqlitePath
      ? new SqliteStateStore({ path: config.persistence.sqlitePath })
      : new MemoryStateStore());
  const host =
    overrides.host ?? new LocalCertificationHost({ serviceId: config.serviceId, secret: config.certification.secret });

  return new SubnetCensusService({
    serviceId: config.serviceId,
    host,
    pipeline,
    stateStore,
    cooldownNs: secondsToNanos(config.refresh.cooldownSeconds),
    staleAfterMinutes: config.freshness.staleAfterMinutes,
    missingGeneration: config.correlation.missingGeneration,
    realSubnetFilter: realSubnetFilterFromConfig(config.stats),
    now: overrides.now,
    logger
  });
}
