export const APP_CONFIG = Symbol("APP_CONFIG");
export const DETECTION_MODEL = Symbol("DETECTION_MODEL");
export const PIPELINE_STATE = Symbol("PIPELINE_STATE");
