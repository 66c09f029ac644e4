export const SERVICE_NAME = "lms-push-relay";
export const VERSION = "0.1.0";
