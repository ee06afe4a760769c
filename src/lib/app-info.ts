import { version } from '../../package.json';

/** Fixed identifier of this bridge in logs, reports and service lists */
export const SERVICE_NAME = 'alert-log-bridge';

export const APP_VERSION: string = version;
