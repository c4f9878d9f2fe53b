import { v4 as uuidv4 } from 'uuid';

export const TOKEN_EXCHANGE_URL = 'https://api.github.com/copilot_internal/v2/token';

const EDITOR_PLUGIN_VERSION = 'copilot-chat/0.26.7';
const USER_AGENT = 'GitHubCopilotChat/0.26.7';
const API_VERSION = '2025-04-01';

/**
 * Chat backend host for an account tier: `individual` uses the shared host,
 * other tiers get their own subdomain.
 */
export function backendBaseUrl(accountType: string): string {
  return accountType === 'individual'
    ? 'https://api.githubcopilot.com'
    : `https://api.${accountType}.githubcopilot.com`;
}

/**
 * Headers for the long-lived → short-lived token exchange.
 */
export function exchangeHeaders(longLivedToken: string, editorVersion: string): Record<string, string> {
  return {
    'content-type': 'application/json',
    accept: 'application/json',
    authorization: `token ${longLivedToken}`,
    'editor-version': `vscode/${editorVersion}`,
    'editor-plugin-version': EDITOR_PLUGIN_VERSION,
    'user-agent': USER_AGENT,
    'x-github-api-version': API_VERSION,
    'x-vscode-user-agent-library-version': 'electron-fetch',
  };
}

export interface BackendHeaderOptions {
  editorVersion: string;
  vision?: boolean;
  /** `true` → `x-initiator: agent`, `false` → `user`, unset → header omitted. */
  agent?: boolean;
  requestId?: string;
}

/**
 * Headers for calls to the chat backend with a short-lived credential.
 */
export function backendHeaders(credential: string, options: BackendHeaderOptions): Record<string, string> {
  const headers: Record<string, string> = {
    authorization: `Bearer ${credential}`,
    'content-type': 'application/json',
    'copilot-integration-id': 'vscode-chat',
    'editor-version': `vscode/${options.editorVersion}`,
    'editor-plugin-version': EDITOR_PLUGIN_VERSION,
    'user-agent': USER_AGENT,
    'openai-intent': 'conversation-panel',
    'x-github-api-version': API_VERSION,
    'x-request-id': options.requestId ?? uuidv4(),
    'x-vscode-user-agent-library-version': 'electron-fetch',
  };
  if (options.vision) {
    headers['copilot-vision-request'] = 'true';
  }
  if (options.agent !== undefined) {
    headers['x-initiator'] = options.agent ? 'agent' : 'user';
  }
  return headers;
}
