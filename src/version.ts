export const APP_NAME = 'ragsql';
export const APP_VERSION = '1.0.0';
