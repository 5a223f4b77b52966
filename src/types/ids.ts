export type SubnetId = string;
export type NodeId = string;
export type CallerId = string;
export type ServiceId = string;

// Nanoseconds since the Unix epoch.
export type Nanos = bigint;
