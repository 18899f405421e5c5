export { refreshAccessToken, DROPBOX_TOKEN_URL } from './token-refresher.js';
export type { AccessToken, RefreshCredentials, RefreshOptions } from './token-refresher.js';
