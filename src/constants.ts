// number of queued items that triggers an immediate flush
export const DEFAULT_MAX_BATCH_SIZE = 10;
// milliseconds to wait after the last scheduled item before flushing
export const DEFAULT_MAX_WAIT_MS = 2_000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 5_000;
export const DEFAULT_CONTENT_TYPE = 'application/json';
export const DEFAULT_QUEUE_NAME = 'epc-outbound';
export const SESSION_STORAGE_KEY = 'epc-session';
// a session never expires unless the host configures a timeout
export const DEFAULT_SESSION_TIMEOUT_MS = Infinity;
export const COLLECTOR_URL_ENV_VAR = 'EPC_COLLECTOR_URL';
