import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as path from 'path';
import { FetchError, ToolInvocationError } from '../../../../src/deploy/errors.js';
import {
  ArchiveFetcher,
  detectArchiveKind,
  flattenSingleDirectory,
  sha1File,
} from '../../../../src/deploy/fetch/index.js';
import { RecordingToolRunner, makeTempDir, removeDir, writeFiles } from '../../../helpers/DeployTestHelpers.js';
import type { ToolCall } from '../../../helpers/DeployTestHelpers.js';

describe('ArchiveFetcher', () => {
  let root: string;
  let workspace: string;

  beforeEach(async () => {
    root = await makeTempDir('archive');
    workspace = path.join(root, 'ws');
    await fs.mkdir(workspace);
  });

  afterEach(async () => {
    await removeDir(root);
  });

  describe('detectArchiveKind', () => {
    it('should recognise tar variants', () => {
      for (const name of ['a.tar', 'a.tar.gz', 'a.tgz', 'a.tar.bz2', 'a.tbz2', 'a.tar.xz', 'A.TXZ']) {
        expect(detectArchiveKind(name)).toBe('tar');
      }
    });

    it('should recognise zip', () => {
      expect(detectArchiveKind('site.ZIP')).toBe('zip');
    });

    it('should return null for anything else', () => {
      expect(detectArchiveKind('site.rar')).toBeNull();
      expect(detectArchiveKind('tgz')).toBeNull();
    });
  });

  describe('sha1File', () => {
    it('should hash the file contents', async () => {
      await writeFiles(root, { 'hello.txt': 'hello\n' });
      expect(await sha1File(path.join(root, 'hello.txt'))).toBe('f572d396fae9206628714fb2ce00f72e94f2258f');
    });
  });

  describe('flattenSingleDirectory', () => {
    it('should move the contents of a lone directory up', async () => {
      await writeFiles(workspace, { 'site-1.0/deploy.json': '{}', 'site-1.0/js/app.js': 'x' });

      expect(await flattenSingleDirectory(workspace)).toBe(true);
      expect((await fs.readdir(workspace)).sort()).toEqual(['deploy.json', 'js']);
      expect(await fs.readFile(path.join(workspace, 'js/app.js'), 'utf-8')).toBe('x');
    });

    it('should cope with a child named like its parent', async () => {
      await writeFiles(workspace, { 'site/site/index.html': 'i' });

      expect(await flattenSingleDirectory(workspace)).toBe(true);
      expect(await fs.readFile(path.join(workspace, 'site/index.html'), 'utf-8')).toBe('i');
    });

    it('should not count hidden entries beside the lone directory', async () => {
      await writeFiles(workspace, { '.DS_Store': '', 'site-1.0/deploy.json': '{}' });

      expect(await flattenSingleDirectory(workspace)).toBe(true);
      expect((await fs.readdir(workspace)).sort()).toEqual(['.DS_Store', 'deploy.json']);
    });

    it('should leave a lone hidden directory alone', async () => {
      await writeFiles(workspace, { '.git/HEAD': 'ref' });
      expect(await flattenSingleDirectory(workspace)).toBe(false);
    });

    it('should leave several entries alone', async () => {
      await writeFiles(workspace, { 'a/x': '', 'b/y': '' });
      expect(await flattenSingleDirectory(workspace)).toBe(false);
      expect((await fs.readdir(workspace)).sort()).toEqual(['a', 'b']);
    });

    it('should leave a lone file alone', async () => {
      await writeFiles(workspace, { 'deploy.json': '{}' });
      expect(await flattenSingleDirectory(workspace)).toBe(false);
    });
  });

  describe('fetch', () => {
    function extractingRunner(): RecordingToolRunner {
      return new RecordingToolRunner(async (call: ToolCall) => {
        const target = call.args[call.args.length - 1] ?? '';
        await writeFiles(target, { 'site-1.0/deploy.json': '{}' });
        return { stdout: '', stderr: '' };
      });
    }

    it('should extract a tarball, hash it and flatten it', async () => {
      await writeFiles(root, { 'site.tgz': 'archive-bytes' });
      const archive = path.join(root, 'site.tgz');
      const tools = extractingRunner();

      const result = await new ArchiveFetcher(tools).fetch({ kind: 'package', path: archive }, workspace);

      expect(result).toEqual({
        provenanceUrl: `file://${archive}`,
        commit: '01f53f787c3c190375b1b9ac6a644a24d9899b04',
      });
      expect(tools.calls.map((call) => [call.command, ...call.args])).toEqual([
        ['tar', '-xf', archive, '-C', workspace],
      ]);
      expect(await fs.readdir(workspace)).toEqual(['deploy.json']);
    });

    it('should unzip zip files', async () => {
      await writeFiles(root, { 'site.zip': 'archive-bytes' });
      const archive = path.join(root, 'site.zip');
      const tools = extractingRunner();

      await new ArchiveFetcher(tools).fetch({ kind: 'package', path: archive }, workspace);

      expect(tools.calls.map((call) => [call.command, ...call.args])).toEqual([
        ['unzip', '-q', '-o', archive, '-d', workspace],
      ]);
    });

    it('should reject unknown archive types before running anything', async () => {
      const archive = path.join(root, 'site.rar');
      const tools = new RecordingToolRunner();

      await expect(new ArchiveFetcher(tools).fetch({ kind: 'package', path: archive }, workspace)).rejects.toThrow(
        `failed to fetch <local>/${archive}: unsupported archive type [site.rar]`
      );
      expect(tools.calls).toHaveLength(0);
    });

    it('should wrap extraction failures', async () => {
      await writeFiles(root, { 'site.tar': 'not really a tar' });
      const archive = path.join(root, 'site.tar');
      const tools = new RecordingToolRunner(() => {
        throw new ToolInvocationError('tar', ['-xf', archive], 2, 'tar: This does not look like a tar archive');
      });

      const failure = new ArchiveFetcher(tools).fetch({ kind: 'package', path: archive }, workspace);

      await expect(failure).rejects.toThrow(FetchError);
      await expect(failure).rejects.toThrow('tar: This does not look like a tar archive');
    });

    it('should wrap a missing archive', async () => {
      const archive = path.join(root, 'missing.tgz');

      await expect(
        new ArchiveFetcher(new RecordingToolRunner()).fetch({ kind: 'package', path: archive }, workspace)
      ).rejects.toThrow(FetchError);
    });
  });
});
