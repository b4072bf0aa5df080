import { expect } from 'chai';
import { describe, it, beforeEach } from 'mocha';
import { DriveClient } from '../../../src/api/driveClient.js';
import { TreeEnumerator, joinPath } from '../../../src/core/sync/TreeEnumerator.js';
import { EnumerationError, PermanentServiceError } from '../../../src/errors/syncErrors.js';
import { TestAssertionHelpers } from '../../helpers/assertions.js';
import { FakeDrive, fastGovernor } from '../../helpers/fakeDrive.js';

/**
 * root
 * ├── a/
 * │   ├── b.txt
 * │   └── inner/
 * │       └── deep.txt
 * ├── top.txt
 * └── z/
 *     └── z1.txt
 */
function buildTree(drive: FakeDrive): { root: string; a: string } {
  const root = drive.addRoot('root');
  const a = drive.addFolder(root, 'a');
  drive.addFile(root, 'top.txt', { size: 3, contentHash: 'top' });
  const z = drive.addFolder(root, 'z');
  drive.addFile(a, 'b.txt', { size: 5, contentHash: 'bbb' });
  const inner = drive.addFolder(a, 'inner');
  drive.addFile(inner, 'deep.txt', { size: 0 });
  drive.addFile(z, 'z1.txt', { size: 7, contentHash: 'zzz' });
  return { root, a };
}

describe('TreeEnumerator', () => {
  let drive: FakeDrive;
  let client: DriveClient;
  let enumerator: TreeEnumerator;

  beforeEach(() => {
    drive = new FakeDrive();
    client = new DriveClient(drive, { governor: fastGovernor() });
    enumerator = new TreeEnumerator(client);
  });

  it('should join relative paths', () => {
    expect(joinPath('', 'a')).to.equal('a');
    expect(joinPath('a/b', 'c.txt')).to.equal('a/b/c.txt');
  });

  it('should flatten the tree in pre-order', async () => {
    const { root, a } = buildTree(drive);
    const snapshot = await enumerator.enumerate(root, { label: 'source' });

    expect([...snapshot.files.keys()]).to.deep.equal(['top.txt', 'a/b.txt', 'a/inner/deep.txt', 'z/z1.txt']);
    expect([...snapshot.folders.keys()]).to.deep.equal(['a', 'z', 'a/inner']);
    expect(snapshot.folders.get('a')).to.equal(a);
    expect(snapshot.rootId).to.equal(root);
    expect(snapshot.incompletePaths).to.deep.equal([]);
  });

  it('should record size, checksum and type of each file', async () => {
    const { root } = buildTree(drive);
    const snapshot = await enumerator.enumerate(root);

    const b = snapshot.files.get('a/b.txt');
    expect(b?.size).to.equal(5);
    expect(b?.contentHash).to.equal('bbb');
    expect(b?.mimeType).to.equal('application/octet-stream');

    const deep = snapshot.files.get('a/inner/deep.txt');
    expect(deep?.size).to.equal(0);
    expect(deep?.contentHash).to.be.null;
  });

  it('should follow page tokens', async () => {
    drive = new FakeDrive(1);
    client = new DriveClient(drive, { governor: fastGovernor() });
    const { root } = buildTree(drive);

    const snapshot = await new TreeEnumerator(client).enumerate(root);

    expect(snapshot.files.size).to.equal(4);
    expect(snapshot.folders.size).to.equal(3);
    // one call per item, items: root 3, a 2, inner 1, z 1
    expect(drive.calls.listChildren).to.equal(7);
  });

  it('should serve a repeated enumeration from the cache', async () => {
    const { root } = buildTree(drive);
    const first = await enumerator.enumerate(root);
    const calls = drive.calls.listChildren;

    const second = await enumerator.enumerate(root);
    expect(second).to.equal(first);
    expect(drive.calls.listChildren).to.equal(calls);
  });

  it('should enumerate again when fresh is requested', async () => {
    const { root } = buildTree(drive);
    await enumerator.enumerate(root);
    drive.addFile(root, 'late.txt');

    const fresh = await enumerator.enumerate(root, { fresh: true });
    expect(fresh.files.has('late.txt')).to.be.true;
  });

  it('should fail the pass when the root cannot be listed', async () => {
    const { root } = buildTree(drive);
    drive.injectFailure('listChildren', root, new PermanentServiceError('files.list', 'File not found', 404));

    const error = await TestAssertionHelpers.expectRejection(() => enumerator.enumerate(root), EnumerationError);
    expect(error.message).to.equal(`Cannot enumerate folder ${root}: files.list failed: File not found`);
    expect(client.getCachedSnapshot(root)).to.be.undefined;
  });

  it('should continue past a folder that cannot be listed', async () => {
    const { root, a } = buildTree(drive);
    drive.injectFailure('listChildren', a, new PermanentServiceError('files.list', 'Insufficient permissions', 403));

    const snapshot = await enumerator.enumerate(root);

    expect([...snapshot.files.keys()]).to.deep.equal(['top.txt', 'z/z1.txt']);
    expect(snapshot.folders.has('a')).to.be.true;
    expect(snapshot.incompletePaths).to.deep.equal(['a']);
  });

  it('should report progress against the counted total', async () => {
    const { root } = buildTree(drive);
    const reports: Array<[number, number]> = [];

    await enumerator.enumerate(root, {
      countItemsFirst: true,
      onProgress: (processed, total) => reports.push([processed, total])
    });

    expect(reports[reports.length - 1]).to.deep.equal([7, 7]);
    expect(reports.every(([, total]) => total === 7)).to.be.true;
  });

  it('should report zero percent when the total is unknown', async () => {
    const { root } = buildTree(drive);
    const percents: number[] = [];

    await enumerator.enumerate(root, { onProgress: (_processed, _total, percent) => percents.push(percent) });

    expect(percents).to.deep.equal([0]);
  });
});
