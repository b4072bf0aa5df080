import { expect } from 'chai';
import { describe, it } from 'mocha';
import type { drive_v3 } from 'googleapis';
import {
  DriveService,
  classifyDriveError,
  describeFailure,
  escapeQueryValue,
  toRemoteNode,
  type DriveFilesApi
} from '../../../src/api/driveService.js';
import { FOLDER_MIME_TYPE, isNativeDocument } from '../../../src/api/driveTypes.js';
import { PermanentServiceError, TransientServiceError } from '../../../src/errors/syncErrors.js';
import { TestAssertionHelpers } from '../../helpers/assertions.js';

/**
 * Error shaped like the ones googleapis throws for an HTTP failure
 */
function apiError(status: number, message: string, reason?: string): Error {
  return Object.assign(new Error(message), {
    code: status,
    response: {
      status,
      data: { error: { code: status, message, errors: reason ? [{ reason, message }] : [] } }
    }
  });
}

function networkError(code: string): Error {
  return Object.assign(new Error(`request failed: ${code}`), { code });
}

function stubApi(overrides: Partial<DriveFilesApi>): DriveFilesApi {
  const unused = async (): Promise<never> => {
    throw new Error('not stubbed');
  };
  return { list: unused, get: unused, create: unused, copy: unused, ...overrides };
}

describe('Drive service adapter', () => {
  describe('describeFailure', () => {
    it('should read status, reason and message from an API error', () => {
      expect(describeFailure(apiError(403, 'User rate limit exceeded', 'userRateLimitExceeded'))).to.deep.equal({
        status: 403,
        reason: 'userRateLimitExceeded',
        message: 'User rate limit exceeded'
      });
    });

    it('should read a network code', () => {
      expect(describeFailure(networkError('ECONNRESET'))).to.deep.equal({
        networkCode: 'ECONNRESET',
        message: 'request failed: ECONNRESET'
      });
    });
  });

  describe('classifyDriveError', () => {
    it('should treat 429, 500 and 503 as transient', () => {
      for (const status of [429, 500, 503]) {
        const classified = classifyDriveError('files.list', apiError(status, 'try later'));
        expect(classified).to.be.instanceOf(TransientServiceError);
        expect(classified.statusCode).to.equal(status);
        expect(classified.operation).to.equal('files.list');
      }
    });

    it('should treat a rate-limited 403 as transient', () => {
      const classified = classifyDriveError('files.copy', apiError(403, 'Rate Limit Exceeded', 'rateLimitExceeded'));
      expect(classified.errorClass).to.equal('retriable');
      expect(classified.reason).to.equal('rateLimitExceeded');
    });

    it('should treat an exhausted-quota 403 as permanent', () => {
      const classified = classifyDriveError('files.copy', apiError(403, 'The user has exceeded their Drive storage quota', 'storageQuotaExceeded'));
      expect(classified).to.be.instanceOf(PermanentServiceError);
      expect(classified.errorClass).to.equal('permanent');
    });

    it('should treat 404 and 400 as permanent', () => {
      expect(classifyDriveError('files.get', apiError(404, 'File not found')).errorClass).to.equal('permanent');
      expect(classifyDriveError('files.list', apiError(400, 'Invalid Value')).errorClass).to.equal('permanent');
    });

    it('should treat connection resets and timeouts as transient', () => {
      for (const code of ['ECONNRESET', 'ETIMEDOUT', 'EAI_AGAIN']) {
        const classified = classifyDriveError('files.list', networkError(code));
        expect(classified.errorClass).to.equal('retriable');
        expect(classified.reason).to.equal(code);
      }
    });

    it('should treat unknown failures as permanent', () => {
      expect(classifyDriveError('files.get', new Error('unexpected')).errorClass).to.equal('permanent');
      expect(classifyDriveError('files.get', networkError('ENOTFOUND')).errorClass).to.equal('permanent');
    });

    it('should pass through errors that are already classified', () => {
      const original = new TransientServiceError('files.list', 'busy', 503);
      expect(classifyDriveError('other', original)).to.equal(original);
    });
  });

  describe('toRemoteNode', () => {
    it('should map a folder without size', () => {
      expect(toRemoteNode({ id: 'f1', name: 'Reports', mimeType: FOLDER_MIME_TYPE, size: '0' })).to.deep.equal({
        id: 'f1',
        name: 'Reports',
        kind: 'folder',
        mimeType: FOLDER_MIME_TYPE
      });
    });

    it('should parse size and checksum of a binary file', () => {
      expect(toRemoteNode({ id: 'b1', name: 'photo.jpg', mimeType: 'image/jpeg', size: '2048', md5Checksum: 'abc123' }))
        .to.deep.equal({ id: 'b1', name: 'photo.jpg', kind: 'file', mimeType: 'image/jpeg', size: 2048, contentHash: 'abc123' });
    });

    it('should give native documents size 0 and no checksum', () => {
      const node = toRemoteNode({ id: 'd1', name: 'Plan', mimeType: 'application/vnd.google-apps.document' });
      expect(node.size).to.equal(0);
      expect(node.contentHash).to.be.null;
      expect(isNativeDocument(node.mimeType)).to.be.true;
      expect(isNativeDocument(FOLDER_MIME_TYPE)).to.be.false;
    });

    it('should reject a resource without id', () => {
      expect(() => toRemoteNode({ name: 'orphan' })).to.throw(PermanentServiceError);
    });
  });

  describe('escapeQueryValue', () => {
    it('should escape quotes and backslashes', () => {
      expect(escapeQueryValue("Bob's \\ files")).to.equal("Bob\\'s \\\\ files");
    });
  });

  describe('DriveService', () => {
    it('should return null metadata for a missing item', async () => {
      const service = new DriveService(stubApi({ get: async () => { throw apiError(404, 'File not found: x'); } }));
      expect(await service.getMetadata('x')).to.be.null;
    });

    it('should classify other metadata failures', async () => {
      const service = new DriveService(stubApi({ get: async () => { throw apiError(503, 'Backend Error'); } }));
      const error = await TestAssertionHelpers.expectRejection(() => service.getMetadata('x'), TransientServiceError);
      expect(error.operation).to.equal('files.get');
    });

    it('should list non-trashed children with the page token', async () => {
      let captured: drive_v3.Params$Resource$Files$List | undefined;
      const service = new DriveService(stubApi({
        list: async params => {
          captured = params;
          return {
            data: {
              nextPageToken: 'page-2',
              files: [
                { id: 'c1', name: 'docs', mimeType: FOLDER_MIME_TYPE },
                { id: 'c2', name: 'a.txt', mimeType: 'text/plain', size: '5', md5Checksum: 'h1' }
              ]
            }
          };
        }
      }));

      const page = await service.listChildren('root-1', 'page-1');

      expect(captured?.q).to.equal("'root-1' in parents and trashed = false");
      expect(captured?.pageToken).to.equal('page-1');
      expect(captured?.pageSize).to.equal(1000);
      expect(captured?.supportsAllDrives).to.be.true;
      expect(captured?.includeItemsFromAllDrives).to.be.true;
      expect(page.nextPageToken).to.equal('page-2');
      expect(page.items.map(item => item.kind)).to.deep.equal(['folder', 'file']);
    });

    it('should report no next page when the listing ends', async () => {
      const service = new DriveService(stubApi({ list: async () => ({ data: { files: [] } }) }));
      const page = await service.listChildren('root-1');
      expect(page.items).to.deep.equal([]);
      expect(page.nextPageToken).to.be.undefined;
    });

    it('should search folders by escaped name', async () => {
      let query: string | undefined;
      const service = new DriveService(stubApi({
        list: async params => {
          query = params.q ?? undefined;
          return { data: { files: [{ id: 'q1', name: "Q's", mimeType: FOLDER_MIME_TYPE }] } };
        }
      }));

      const found = await service.findByName('p1', "Q's", 'folder');

      expect(query).to.equal(
        `name = 'Q\\'s' and 'p1' in parents and trashed = false and mimeType = '${FOLDER_MIME_TYPE}'`
      );
      expect(found?.id).to.equal('q1');
    });

    it('should exclude folders when searching for a file', async () => {
      let query: string | undefined;
      const service = new DriveService(stubApi({
        list: async params => {
          query = params.q ?? undefined;
          return { data: { files: [] } };
        }
      }));

      expect(await service.findByName('p1', 'a.txt', 'file')).to.be.null;
      expect(query).to.equal(`name = 'a.txt' and 'p1' in parents and trashed = false and mimeType != '${FOLDER_MIME_TYPE}'`);
    });

    it('should create a folder under its parent', async () => {
      let body: drive_v3.Schema$File | undefined;
      const service = new DriveService(stubApi({
        create: async params => {
          body = params.requestBody;
          return { data: { id: 'new-1', name: 'docs' } };
        }
      }));

      expect(await service.createFolder('docs', 'parent-1')).to.equal('new-1');
      expect(body).to.deep.equal({ name: 'docs', mimeType: FOLDER_MIME_TYPE, parents: ['parent-1'] });
    });

    it('should copy a file into the destination parent', async () => {
      let params: drive_v3.Params$Resource$Files$Copy | undefined;
      const service = new DriveService(stubApi({
        copy: async p => {
          params = p;
          return { data: { id: 'copy-1', name: 'a.txt' } };
        }
      }));

      expect(await service.copyFile('src-1', 'dest-1', 'a.txt')).to.equal('copy-1');
      expect(params?.fileId).to.equal('src-1');
      expect(params?.requestBody).to.deep.equal({ name: 'a.txt', parents: ['dest-1'] });
    });

    it('should classify copy failures', async () => {
      const service = new DriveService(stubApi({
        copy: async () => { throw apiError(403, 'This file cannot be copied', 'cannotCopyFile'); }
      }));
      const error = await TestAssertionHelpers.expectRejection(() => service.copyFile('s', 'd', 'n'), PermanentServiceError);
      expect(error.reason).to.equal('cannotCopyFile');
      expect(error.statusCode).to.equal(403);
    });
  });
});
