import { expect } from 'chai';
import { describe, it, beforeEach, afterEach } from 'mocha';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { loadAuthorizedClient, parseClientSecrets, parseStoredToken } from '../../../src/auth/credentials.js';
import { AuthenticationError } from '../../../src/errors/syncErrors.js';
import { TestAssertionHelpers } from '../../helpers/assertions.js';

const secrets = {
  installed: {
    client_id: 'test-client.apps.googleusercontent.com',
    client_secret: 'test-secret',
    redirect_uris: ['http://localhost']
  }
};

async function waitFor(check: () => Promise<boolean>): Promise<void> {
  for (let i = 0; i < 50; i++) {
    if (await check()) {
      return;
    }
    await new Promise(resolve => setTimeout(resolve, 10));
  }
  expect.fail('condition not reached');
}

describe('credentials', () => {
  describe('parseClientSecrets', () => {
    it('should read the installed layout', () => {
      expect(parseClientSecrets(secrets)).to.deep.equal({
        clientId: 'test-client.apps.googleusercontent.com',
        clientSecret: 'test-secret',
        redirectUri: 'http://localhost'
      });
    });

    it('should read the web layout', () => {
      expect(parseClientSecrets({ web: { client_id: 'web-id', client_secret: 'test-secret' } })).to.deep.equal({
        clientId: 'web-id',
        clientSecret: 'test-secret',
        redirectUri: undefined
      });
    });

    it('should reject secrets without a client id', () => {
      expect(() => parseClientSecrets({ installed: { client_secret: 'test-secret' } })).to.throw(AuthenticationError);
    });
  });

  describe('parseStoredToken', () => {
    it('should read a googleapis token file', () => {
      expect(parseStoredToken({ access_token: 'test-access', refresh_token: 'test-refresh', expiry_date: 1000 })).to.deep.equal({
        access_token: 'test-access',
        refresh_token: 'test-refresh',
        expiry_date: 1000
      });
    });

    it('should read an authorized-user file with an ISO expiry', () => {
      const token = parseStoredToken({
        token: 'test-access',
        refresh_token: 'test-refresh',
        expiry: '2030-01-01T00:00:00Z'
      });
      expect(token.access_token).to.equal('test-access');
      expect(token.expiry_date).to.equal(Date.UTC(2030, 0, 1));
    });

    it('should require a refresh token', () => {
      expect(() => parseStoredToken({ access_token: 'test-access' })).to.throw(
        AuthenticationError,
        'Stored token has no refresh_token'
      );
    });
  });

  describe('loadAuthorizedClient', () => {
    let tempDir: string;
    let secretsPath: string;
    let tokenPath: string;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'drive-sync-auth-'));
      secretsPath = path.join(tempDir, 'client_secrets.json');
      tokenPath = path.join(tempDir, 'token.json');
      await fs.writeFile(secretsPath, JSON.stringify(secrets), 'utf-8');
      await fs.writeFile(tokenPath, JSON.stringify({ refresh_token: 'test-refresh', scope: 'drive' }), 'utf-8');
    });

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('should build a client carrying the stored credentials', async () => {
      const client = await loadAuthorizedClient(secretsPath, tokenPath);
      expect(client.credentials.refresh_token).to.equal('test-refresh');
      expect(client.credentials.scope).to.equal('drive');
    });

    it('should write refreshed tokens back to the token file', async () => {
      const client = await loadAuthorizedClient(secretsPath, tokenPath);
      client.emit('tokens', { access_token: 'test-new-access', expiry_date: 2000 });

      await waitFor(async () => (await fs.readFile(tokenPath, 'utf-8')).includes('test-new-access'));
      const saved: unknown = JSON.parse(await fs.readFile(tokenPath, 'utf-8'));
      expect(saved).to.deep.equal({
        refresh_token: 'test-refresh',
        scope: 'drive',
        access_token: 'test-new-access',
        expiry_date: 2000
      });
    });

    it('should fail with instructions when the token file is missing', async () => {
      await fs.rm(tokenPath);
      const error = await TestAssertionHelpers.expectRejection(
        () => loadAuthorizedClient(secretsPath, tokenPath),
        AuthenticationError
      );
      expect(error.data).to.include({ requiresAuth: true, path: tokenPath });
    });

    it('should reject a token file that is not JSON', async () => {
      await fs.writeFile(tokenPath, 'refresh=abc', 'utf-8');
      const error = await TestAssertionHelpers.expectRejection(
        () => loadAuthorizedClient(secretsPath, tokenPath),
        AuthenticationError
      );
      expect(error.message).to.equal(`token at ${tokenPath} is not valid JSON`);
    });
  });
});
