import { expect } from 'chai';
import { describe, it } from 'mocha';
import { DriveClient } from '../../../src/api/driveClient.js';
import { SyncValidator, compareSnapshots, missingFiles } from '../../../src/core/sync/SyncValidator.js';
import type { SnapshotFile, TreeSnapshot } from '../../../src/types/syncTypes.js';
import { FakeDrive, fastGovernor } from '../../helpers/fakeDrive.js';

function snapshot(
  files: Record<string, Partial<SnapshotFile>>,
  folders: string[] = [],
  incompletePaths: string[] = []
): TreeSnapshot {
  return {
    rootId: 'root',
    files: new Map(
      Object.entries(files).map(([path, meta]) => [
        path,
        { id: path, size: 0, contentHash: null, mimeType: 'text/plain', ...meta }
      ])
    ),
    folders: new Map(folders.map(path => [path, path])),
    incompletePaths,
    createdAt: 0
  };
}

describe('SyncValidator', () => {
  describe('compareSnapshots', () => {
    it('should pass identical trees', () => {
      const tree = snapshot({ 'a/b.txt': { size: 4, contentHash: 'b' } }, ['a']);
      const report = compareSnapshots(tree, tree);
      expect(report).to.deep.equal({
        passed: true,
        sourceFileCount: 1,
        destFileCount: 1,
        mismatches: [],
        extraFiles: [],
        incompletePaths: []
      });
    });

    it('should report every kind of mismatch', () => {
      const source = snapshot(
        {
          'gone.txt': { size: 9 },
          'short.txt': { size: 10 },
          'edited.txt': { size: 5, contentHash: 'one' },
          'same.txt': { size: 1, contentHash: 's' }
        },
        ['sub']
      );
      const dest = snapshot({
        'short.txt': { size: 8 },
        'edited.txt': { size: 5, contentHash: 'two' },
        'same.txt': { size: 1, contentHash: 's' },
        'extra.txt': { size: 2 }
      });

      const report = compareSnapshots(source, dest);

      expect(report.passed).to.be.false;
      expect(report.mismatches).to.deep.equal([
        { kind: 'missing-folder', path: 'sub', message: 'Folder missing in destination: sub' },
        { kind: 'missing-file', path: 'gone.txt', sourceSize: 9, message: 'File missing in destination: gone.txt' },
        {
          kind: 'size-mismatch',
          path: 'short.txt',
          sourceSize: 10,
          destSize: 8,
          message: 'Size mismatch for short.txt: 10 vs 8'
        },
        {
          kind: 'hash-mismatch',
          path: 'edited.txt',
          sourceSize: 5,
          destSize: 5,
          message: 'Content hash mismatch for edited.txt'
        }
      ]);
      expect(report.extraFiles).to.deep.equal(['extra.txt']);
      expect(missingFiles(report)).to.deep.equal(['gone.txt']);
    });

    it('should pass when destination has only extra files', () => {
      const report = compareSnapshots(snapshot({}), snapshot({ 'extra.txt': {} }));
      expect(report.passed).to.be.true;
      expect(report.extraFiles).to.deep.equal(['extra.txt']);
    });

    it('should carry incomplete listings of both sides', () => {
      const report = compareSnapshots(snapshot({}, [], ['locked']), snapshot({}, [], ['']));
      expect(report.incompletePaths).to.deep.equal(['source:locked', 'destination:/']);
    });

    it('should fail when part of the source could not be listed', () => {
      const tree = snapshot({ 'ok.txt': { size: 2 } }, ['private']);
      const report = compareSnapshots(snapshot({ 'ok.txt': { size: 2 } }, ['private'], ['private']), tree);
      expect(report.mismatches).to.deep.equal([]);
      expect(report.passed).to.be.false;
    });

    it('should still pass when only the destination listing was incomplete', () => {
      const tree = snapshot({ 'ok.txt': { size: 2 } });
      expect(compareSnapshots(tree, snapshot({ 'ok.txt': { size: 2 } }, [], ['old'])).passed).to.be.true;
    });
  });

  describe('validate', () => {
    it('should re-enumerate both trees instead of using cached snapshots', async () => {
      const drive = new FakeDrive();
      const source = drive.addRoot('source');
      const dest = drive.addRoot('dest');
      drive.addFile(source, 'a.txt', { size: 3, contentHash: 'a' });
      const client = new DriveClient(drive, { governor: fastGovernor() });
      const validator = new SyncValidator(client);

      const before = await validator.validate(source, dest);
      expect(before.passed).to.be.false;
      expect(missingFiles(before)).to.deep.equal(['a.txt']);

      drive.addFile(dest, 'a.txt', { size: 3, contentHash: 'a' });
      const after = await validator.validate(source, dest);
      expect(after.passed).to.be.true;
      expect(after.destFileCount).to.equal(1);
    });
  });
});
