export const APP_CONFIG = Symbol("APP_CONFIG");
export const FETCH_IMPL = Symbol("FETCH_IMPL");
