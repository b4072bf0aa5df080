import { promises as fs } from 'fs';
import { google, type Auth } from 'googleapis';
import { AuthenticationError, errorMessage } from '../errors/syncErrors.js';
import { log } from '../utils/logger.js';

/**
 * OAuth client identity from a Google Cloud client-secrets file
 */
export interface ClientSecrets {
  clientId: string;
  clientSecret: string;
  redirectUri?: string;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(source: JsonObject, key: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

async function readJson(filePath: string, what: string): Promise<JsonObject> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new AuthenticationError(`Cannot read ${what} at ${filePath}: ${errorMessage(error)}`, filePath);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new AuthenticationError(`${what} at ${filePath} is not valid JSON`, filePath);
  }
  if (!isObject(parsed)) {
    throw new AuthenticationError(`${what} at ${filePath} is not a JSON object`, filePath);
  }
  return parsed;
}

/**
 * Accepts both "installed" (desktop) and "web" client-secrets layouts
 */
export function parseClientSecrets(raw: JsonObject, filePath = 'client secrets'): ClientSecrets {
  const section = isObject(raw.installed) ? raw.installed : isObject(raw.web) ? raw.web : raw;
  const clientId = stringField(section, 'client_id');
  const clientSecret = stringField(section, 'client_secret');
  if (!clientId || !clientSecret) {
    throw new AuthenticationError(`Client secrets file is missing client_id or client_secret`, filePath);
  }
  const redirectUris = section.redirect_uris;
  const redirectUri = Array.isArray(redirectUris) && typeof redirectUris[0] === 'string' ? redirectUris[0] : undefined;
  return { clientId, clientSecret, redirectUri };
}

/**
 * Accepts googleapis token files and authorized-user files (`token`, ISO `expiry`)
 */
export function parseStoredToken(raw: JsonObject, filePath = 'token'): Auth.Credentials {
  const refreshToken = stringField(raw, 'refresh_token');
  if (!refreshToken) {
    throw new AuthenticationError('Stored token has no refresh_token', filePath);
  }

  const credentials: Auth.Credentials = { refresh_token: refreshToken };
  const accessToken = stringField(raw, 'access_token') ?? stringField(raw, 'token');
  if (accessToken) {
    credentials.access_token = accessToken;
  }
  if (typeof raw.expiry_date === 'number') {
    credentials.expiry_date = raw.expiry_date;
  } else {
    const expiry = stringField(raw, 'expiry');
    const parsed = expiry ? Date.parse(expiry) : NaN;
    if (!Number.isNaN(parsed)) {
      credentials.expiry_date = parsed;
    }
  }
  const scope = stringField(raw, 'scope');
  if (scope) {
    credentials.scope = scope;
  }
  return credentials;
}

/**
 * Build an authorized client from stored credentials. Refreshed tokens are
 * merged back into the token file.
 */
export async function loadAuthorizedClient(clientSecretsPath: string, tokenPath: string): Promise<Auth.OAuth2Client> {
  const secrets = parseClientSecrets(await readJson(clientSecretsPath, 'client secrets'), clientSecretsPath);
  const storedToken = await readJson(tokenPath, 'token');
  const credentials = parseStoredToken(storedToken, tokenPath);

  const client = new google.auth.OAuth2(secrets.clientId, secrets.clientSecret, secrets.redirectUri);
  client.setCredentials(credentials);

  client.on('tokens', (tokens: Auth.Credentials) => {
    const merged: JsonObject = { ...storedToken, ...tokens };
    fs.writeFile(tokenPath, JSON.stringify(merged, null, 2), 'utf-8')
      .then(() => log.debug(`[AUTH] Saved refreshed token to ${tokenPath}`))
      .catch(error => log.warn(`[AUTH] Could not save refreshed token: ${errorMessage(error)}`));
  });

  log.info(`[AUTH] Loaded credentials for client ${secrets.clientId.slice(0, 12)}...`);
  return client;
}
