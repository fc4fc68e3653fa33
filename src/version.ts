export const APP_NAME = "model-relay";
export const APP_VERSION = "0.1.0";
