export const PLUGIN_NAMES = {
  SIMPLE_PREDICTOR: 'simple_predictor',
  MOVING_AVERAGE: 'moving_average',
};

export const DEFAULT_PLUGIN = PLUGIN_NAMES.SIMPLE_PREDICTOR;

export const BULLMQ_CONSTANTS = {
  JOBS: {
    PROCESS_JOB: 'process-job',
  },
  // BullMQ treats 1 as the most urgent priority.
  PRIORITY_BASE: 1000,
  MAX_PRIORITY: 2_097_152,
};

export const NGSI_LD = {
  ENTITY_TYPE: 'Prediction',
  ID_PREFIX: 'urn:ngsi-ld:Prediction',
  ENTITIES_PATH: '/ngsi-ld/v1/entities',
  UPSERT_PATH: '/ngsi-ld/v1/entityOperations/upsert',
  CONTENT_TYPE: 'application/ld+json',
  CONTEXT_REL: 'http://www.w3.org/ns/json-ld#context',
  DIMENSIONLESS_UNIT: 'C62',
};

export const TENANT_HEADER = 'x-tenant-id';

export const PREDICTION_HORIZON = {
  MIN: 1,
  MAX: 168,
  DEFAULT: 24,
};
