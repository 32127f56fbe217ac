export { isValidUrl, composeUrl } from './url.js';
export { normalizeHeaders, headerValues, headerTokens, hasHeader } from './headers.js';
export { sleep } from './sleep.js';
export { buildUserAgent, getPackageInfo, type PackageInfo } from './user-agent.js';
