export enum Generation {
  GEN1 = 'Gen1',
  GEN2 = 'Gen2',
  UNKNOWN = 'Unknown'
}

export enum GenerationRule {
  TAG = 'TAG',
  REWARD_TYPE = 'REWARD_TYPE'
}

export enum ErrorCode {
  RESOURCE_EXHAUSTED = 'RESOURCE_EXHAUSTED',
  HTTP_STATUS = 'HTTP_STATUS',
  TRANSPORT = 'TRANSPORT',
  DECODE = 'DECODE',
  PARSE = 'PARSE',
  CORRELATION = 'CORRELATION',
  RATE_LIMITED = 'RATE_LIMITED',
  BUSY = 'BUSY',
  NOT_FOUND = 'NOT_FOUND',
  CERTIFICATION = 'CERTIFICATION',
  CONFIG = 'CONFIG'
}
