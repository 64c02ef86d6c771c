import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  CalculateSsdeepHashesUseCase,
  NO_INPUT_FILES_MESSAGE,
} from '../../../src/application/use-cases';
import { InputFileResolverService } from '../../../src/application/services/input-file-resolver.service';
import { Base64TaskResultCodec } from '../../../src/infrastructure/adapters/codec/base64-task-result.codec';
import { LocalOutputFileStorageAdapter } from '../../../src/infrastructure/adapters/storage/local-output-file-storage.adapter';
import { TaskResultDecodeError } from '../../../src/domain/errors/worker.errors';
import type { PinoLoggerService } from '../../../src/shared/logging/pino-logger.service';
import {
  InMemoryHashToolAdapter,
  InMemoryOutputFileStorageAdapter,
} from '../../in-memory-adapters';
import { createTestLogger, encodeUpstreamResult, spyOnLogger } from '../helpers/mock-factories';

describe('CalculateSsdeepHashesUseCase', () => {
  let useCase: CalculateSsdeepHashesUseCase;
  let hashTool: InMemoryHashToolAdapter;
  let outputStorage: InMemoryOutputFileStorageAdapter;
  let logger: PinoLoggerService;
  let logSpies: ReturnType<typeof spyOnLogger>;

  beforeEach(() => {
    hashTool = new InMemoryHashToolAdapter();
    outputStorage = new InMemoryOutputFileStorageAdapter();
    logger = createTestLogger();
    logSpies = spyOnLogger(logger);

    // Create use case directly (no NestJS testing utilities)
    useCase = new CalculateSsdeepHashesUseCase(
      hashTool,
      outputStorage,
      new InputFileResolverService(new Base64TaskResultCodec()),
      logger,
    );
  });

  describe('Per-file outcomes', () => {
    it('should write the digest of a successful run', async () => {
      hashTool.respondTo('/data/a.txt', { status: 0, stdout: 'HASH123,"a.txt"', stderr: '' });

      const result = await useCase.execute({
        inputFiles: [{ path: '/data/a.txt', display_name: 'a.txt' }],
        outputPath: '/out',
        workflowId: 'wf-1',
      });

      expect(hashTool.getCalls()).toEqual(['/data/a.txt']);
      expect(outputStorage.getContent('/out/output-1.ssdeep')).toBe('HASH123\n');
      expect(result).toEqual({
        output_files: [
          {
            uuid: 'output-1',
            display_name: 'SSDeep hash for a.txt.ssdeep',
            extension: 'ssdeep',
            data_type: 'text/plain',
            path: '/out/output-1.ssdeep',
          },
        ],
        workflow_id: 'wf-1',
        command: 'ssdeep -s -b',
        meta: {},
      });
    });

    it('should write the tool error and log a warning for a failing run', async () => {
      hashTool.respondTo('/data/b.txt', { status: 1, stdout: '', stderr: 'file not found' });

      const result = await useCase.execute({
        inputFiles: [{ path: '/data/b.txt', display_name: 'b.txt' }],
        outputPath: '/out',
      });

      expect(outputStorage.getContent('/out/output-1.ssdeep')).toBe(
        'Error running ssdeep (code 1): file not found\n',
      );
      expect(result.output_files).toHaveLength(1);
      expect(logSpies.warn).toHaveBeenCalledWith(
        { path: '/data/b.txt', status: 1 },
        'SSDeep failed for /data/b.txt: Error running ssdeep (code 1): file not found',
      );
    });

    it('should write a notice when the tool prints no digest', async () => {
      hashTool.respondTo('/data/c.txt', {
        status: 0,
        stdout: 'c.txt is too small to produce meaningful results\n',
        stderr: '',
      });

      await useCase.execute({
        inputFiles: [{ path: '/data/c.txt', display_name: 'c.txt' }],
        outputPath: '/out',
      });

      expect(outputStorage.getContent('/out/output-1.ssdeep')).toBe(
        'SSDeep notice: c.txt is too small to produce meaningful results\n',
      );
      expect(logSpies.warn).not.toHaveBeenCalled();
    });

    it('should turn a rejected tool run into an error artifact instead of failing the batch', async () => {
      hashTool
        .rejectFor('/data/a.txt', new Error('pipe closed'))
        .respondTo('/data/b.txt', { status: 0, stdout: 'H2,"b.txt"', stderr: '' });

      const result = await useCase.execute({
        inputFiles: [{ path: '/data/a.txt' }, { path: '/data/b.txt' }],
        outputPath: '/out',
      });

      expect(result.output_files).toHaveLength(2);
      expect(outputStorage.getAllContents()).toEqual([
        'Error running ssdeep (code 127): pipe closed\n',
        'H2\n',
      ]);
    });
  });

  describe('Batch aggregation', () => {
    it('should process files in input order and keep going after failures', async () => {
      hashTool
        .respondTo('/data/a.txt', { status: 0, stdout: 'HASH123,"a.txt"', stderr: '' })
        .respondTo('/data/b.txt', { status: 1, stdout: '', stderr: 'file not found' })
        .respondTo('/data/c.txt', { status: 0, stdout: 'c.txt is too small', stderr: '' });

      const result = await useCase.execute({
        inputFiles: [
          { path: '/data/a.txt', display_name: 'a.txt' },
          { path: '/data/b.txt', display_name: 'b.txt' },
          { path: '/data/c.txt', display_name: 'c.txt' },
        ],
        outputPath: '/out',
      });

      expect(hashTool.getCalls()).toEqual(['/data/a.txt', '/data/b.txt', '/data/c.txt']);
      expect(outputStorage.getAllContents()).toEqual([
        'HASH123\n',
        'Error running ssdeep (code 1): file not found\n',
        'SSDeep notice: c.txt is too small\n',
      ]);
      expect(result.output_files.map((file) => file.display_name)).toEqual([
        'SSDeep hash for a.txt.ssdeep',
        'SSDeep hash for b.txt.ssdeep',
        'SSDeep hash for c.txt.ssdeep',
      ]);
    });

    it('should skip entries without a path and not count them', async () => {
      hashTool.respondTo('/data/a.txt', { status: 0, stdout: 'HASH123,"a.txt"', stderr: '' });

      const result = await useCase.execute({
        inputFiles: [{ display_name: 'orphan', uuid: 'file-9' }, { path: '/data/a.txt' }, { path: '' }],
        outputPath: '/out',
      });

      expect(hashTool.getCalls()).toEqual(['/data/a.txt']);
      expect(result.output_files).toHaveLength(1);
      expect(result.meta).toEqual({});
      expect(logSpies.warn).toHaveBeenCalledWith(
        { inputFile: { display_name: 'orphan', uuid: 'file-9' } },
        'Skipping file entry with no path',
      );
    });

    it('should derive display names from filename and the placeholder', async () => {
      hashTool
        .respondTo('/data/x', { status: 0, stdout: 'H1,"x"', stderr: '' })
        .respondTo('/data/y', { status: 0, stdout: 'H2,"y"', stderr: '' });

      const result = await useCase.execute({
        inputFiles: [{ path: '/data/x', filename: 'x.bin' }, { path: '/data/y' }],
        outputPath: '/out',
      });

      expect(result.output_files.map((file) => file.display_name)).toEqual([
        'SSDeep hash for x.bin.ssdeep',
        'SSDeep hash for input_file.ssdeep',
      ]);
    });

    it('should warn but succeed when every entry was skipped', async () => {
      const result = await useCase.execute({
        inputFiles: [{ display_name: 'a' }, { path: null }],
        outputPath: '/out',
        workflowId: 'wf-2',
      });

      expect(result).toEqual({
        output_files: [],
        workflow_id: 'wf-2',
        command: 'ssdeep -s -b',
        meta: {},
      });
      expect(logSpies.warn).toHaveBeenCalledWith(
        { workflowId: 'wf-2', inputCount: 2 },
        'SSDeep task processed input files but generated no output files overall',
      );
    });

    it('should return an explanatory message when there are no input files', async () => {
      const result = await useCase.execute({ outputPath: '/out', workflowId: 'wf-3' });

      expect(result).toEqual({
        output_files: [],
        workflow_id: 'wf-3',
        command: 'ssdeep -s -b',
        meta: { message: NO_INPUT_FILES_MESSAGE },
      });
      expect(hashTool.getCalls()).toEqual([]);
      expect(outputStorage.getFiles()).toEqual([]);
    });

    it('should report a null workflow id when none is given', async () => {
      const result = await useCase.execute({ inputFiles: [], outputPath: '/out' });

      expect(result.workflow_id).toBeNull();
    });
  });

  describe('Input resolution', () => {
    it('should prefer the piped result over the explicit list', async () => {
      hashTool.respondTo('/piped/p.txt', { status: 0, stdout: 'HP,"p.txt"', stderr: '' });

      const pipeResult = encodeUpstreamResult({
        output_files: [{ path: '/piped/p.txt', display_name: 'p.txt' }],
        workflow_id: 'wf-upstream',
        command: 'unzip',
        meta: {},
      });

      const result = await useCase.execute({
        pipeResult,
        inputFiles: [{ path: '/explicit/e.txt' }],
        outputPath: '/out',
      });

      expect(hashTool.getCalls()).toEqual(['/piped/p.txt']);
      expect(result.output_files[0].display_name).toBe('SSDeep hash for p.txt.ssdeep');
    });

    it('should propagate a piped result that cannot be decoded', async () => {
      await expect(
        useCase.execute({ pipeResult: 'not base64 json', outputPath: '/out' }),
      ).rejects.toBeInstanceOf(TaskResultDecodeError);
    });
  });

  describe('Collaborator faults', () => {
    it('should propagate output storage failures', async () => {
      hashTool.respondTo('/data/a.txt', { status: 0, stdout: 'H,"a"', stderr: '' });
      outputStorage.failWrites(new Error('disk full'));

      await expect(
        useCase.execute({ inputFiles: [{ path: '/data/a.txt' }], outputPath: '/out' }),
      ).rejects.toThrow('disk full');
    });
  });

  describe('With local output storage', () => {
    let outputDir: string;

    beforeEach(async () => {
      outputDir = await mkdtemp(join(tmpdir(), 'ssdeep-usecase-'));
    });

    afterEach(async () => {
      await rm(outputDir, { recursive: true, force: true });
    });

    it('should write one newline-terminated artifact per hashed file', async () => {
      hashTool
        .respondTo('/data/a.txt', { status: 0, stdout: 'HASH123,"a.txt"', stderr: '' })
        .respondTo('/data/b.txt', { status: 1, stdout: '', stderr: 'file not found' });

      const localUseCase = new CalculateSsdeepHashesUseCase(
        hashTool,
        new LocalOutputFileStorageAdapter(logger),
        new InputFileResolverService(new Base64TaskResultCodec()),
        logger,
      );

      const result = await localUseCase.execute({
        inputFiles: [{ path: '/data/a.txt' }, { display_name: 'skipped' }, { path: '/data/b.txt' }],
        outputPath: outputDir,
      });

      expect(result.output_files).toHaveLength(2);
      expect(await readdir(outputDir)).toHaveLength(2);
      expect(await readFile(result.output_files[0].path, 'utf-8')).toBe('HASH123\n');
      expect(await readFile(result.output_files[1].path, 'utf-8')).toBe(
        'Error running ssdeep (code 1): file not found\n',
      );
    });
  });
});
