export { SubnetCensusService } from './service/SubnetCensusService.js';
export type { RefreshStatusWithHistory, SubnetCensusServiceOptions } from './service/SubnetCensusService.js';
export { createSubnetCensusService, realSubnetFilterFromConfig } from './service/createService.js';
export type { ServiceOverrides } from './service/createService.js';

export { ConfigError, loadServiceConfig, parseServiceConfig } from './config/config.js';
export type { ServiceConfig } from './config/config.js';

export { CertifiedAggregateStore } from './aggregate/CertifiedAggregateStore.js';
export { computeNetworkStats, zeroStats } from './aggregate/stats.js';

export { canonicalStatsString, statsFingerprint } from './certify/canonical.js';
export { CertificationError } from './certify/CertificationHost.js';
export type { CertificateInspection, CertificateInspector, CertificationHost } from './certify/CertificationHost.js';
export { LocalCertificationHost, MAX_CERTIFIED_DATA_BYTES } from './certify/LocalCertificationHost.js';
export { VerificationFailure, verifyCertifiedSnapshot } from './certify/verify.js';
export type { VerificationResult } from './certify/verify.js';

export { classifyGenerationTag, classifyRewardType, classifyWith } from './classify/classifier.js';

export { FetchPipeline } from './fetch/FetchPipeline.js';
export type { FetchedDatasets, FetchPipelineOptions } from './fetch/FetchPipeline.js';
export { FetchHttpTransport, TransportError } from './fetch/FetchHttpTransport.js';
export { StaticBudget, unlimitedBudget } from './fetch/budget.js';
export { sanitizeResponse } from './fetch/transform.js';
export type { HttpRequest, HttpResponse, HttpTransport, ResourceBudget, SanitizedResponse } from './fetch/types.js';

export { RefreshController } from './refresh/RefreshController.js';

export type { StateStore } from './store/StateStore.js';
export { MemoryStateStore } from './store/memory/MemoryStateStore.js';
export { SqliteStateStore } from './store/sqlite/SqliteStateStore.js';

export { correlateTopology, MissingGenerationPolicy } from './topology/correlate.js';
export { allOf, defaultRealSubnetFilter, excludeSubnetIds, includeAllSubnets, minNodeCount } from './topology/filters.js';
export type { SubnetFilter } from './topology/filters.js';
export { buildSubnetsFromUpload } from './topology/upload.js';

export * from './types/enums.js';
export * from './types/error.js';
export type * from './types/ids.js';
export type * from './types/persisted.js';
export * from './types/refresh.js';
export * from './types/result.js';
export * from './types/stats.js';
export * from './types/topology.js';
