/**
 * Unit tests for the build and run commands.
 *
 * A real file in a temporary directory stands in for the open document;
 * the toolchain, the timers and the display are fakes.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  toolchainCommand,
  toolchainCore,
  type ToolchainDependencies,
} from '../../commands/toolchain.js';
import type { IConfig } from '../../config/i-config.js';
import type { IConfigLoader } from '../../config/i-config-loader.js';
import { EXIT_CODE } from '../../constants/exit-codes.js';
import type { IDisplay } from '../../display/i-display.js';
import {
  createMockDisplay,
  failed,
  ImmediateInvoker,
  ManualScheduler,
  succeeded,
  testConfig,
} from '../bridge-fakes.js';

describe('toolchain command', () => {
  let tempDir: string;
  let filePath: string;
  let display: jest.Mocked<IDisplay>;
  let scheduler: ManualScheduler;
  let load: jest.Mock<Promise<IConfig>, [string?]>;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'runbridge-command-test-'));
    filePath = path.join(tempDir, 'main.go');
    fs.writeFileSync(filePath, 'package main\n', 'utf8');
    display = createMockDisplay();
    scheduler = new ManualScheduler();
    load = jest.fn(async (_configPath?: string) => testConfig());
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function dependencies(invoker: ImmediateInvoker): ToolchainDependencies {
    const configLoader: IConfigLoader = { load };
    return { configLoader, display, invoker, scheduler };
  }

  describe('toolchainCore', () => {
    it('runs the build in the directory of the file and renders the result', async () => {
      const invoker = new ImmediateInvoker(succeeded());

      const report = await toolchainCore('build', filePath, {}, dependencies(invoker));

      expect(report?.outcome.succeeded).toBe(true);
      expect(invoker.requests).toEqual([
        { command: 'go', args: ['build', './...'], cwd: tempDir },
      ]);
      expect(display.showOutput.mock.calls).toEqual([
        ['Building...\n'],
        ['Build successful\n'],
      ]);
    });

    it('leaves no poller firing scheduled', async () => {
      const invoker = new ImmediateInvoker(succeeded());

      await toolchainCore('run', filePath, {}, dependencies(invoker));

      expect(scheduler.pending).toHaveLength(0);
    });

    it('passes the config path to the loader', async () => {
      const invoker = new ImmediateInvoker(succeeded());

      await toolchainCore(
        'build',
        filePath,
        { config: 'ci.json' },
        dependencies(invoker)
      );

      expect(load).toHaveBeenCalledWith('ci.json');
    });

    it('shows the command line in verbose mode', async () => {
      const invoker = new ImmediateInvoker(succeeded());

      await toolchainCore('run', filePath, { verbose: true }, dependencies(invoker));

      expect(display.showMessage).toHaveBeenCalledWith('Command: go run .');
      expect(display.showMessage).toHaveBeenCalledWith(`Directory: ${tempDir}`);
    });

    it('returns null without a file', async () => {
      const invoker = new ImmediateInvoker(succeeded());

      const report = await toolchainCore('build', undefined, {}, dependencies(invoker));

      expect(report).toBeNull();
      expect(display.showError).toHaveBeenCalledWith(
        'No file open. Please save first.'
      );
      expect(invoker.requests).toHaveLength(0);
      expect(display.showOutput).not.toHaveBeenCalled();
    });
  });

  describe('toolchainCommand', () => {
    it('returns SUCCESS when the toolchain succeeds', async () => {
      const invoker = new ImmediateInvoker(succeeded('hello\n'));

      const exitCode = await toolchainCommand('run', filePath, {}, dependencies(invoker));

      expect(exitCode).toBe(EXIT_CODE.SUCCESS);
      expect(display.showOutput).toHaveBeenLastCalledWith('Run output:\nhello\n');
    });

    it('returns ERROR when the toolchain fails', async () => {
      const invoker = new ImmediateInvoker(
        failed('./main.go:1:1: expected package\n', 'exit status 1')
      );

      const exitCode = await toolchainCommand('build', filePath, {}, dependencies(invoker));

      expect(exitCode).toBe(EXIT_CODE.ERROR);
      expect(display.showOutput).toHaveBeenLastCalledWith(
        'Build failed:\n./main.go:1:1: expected package\n'
      );
    });

    it('returns ERROR without a file', async () => {
      const invoker = new ImmediateInvoker(succeeded());

      const exitCode = await toolchainCommand('run', undefined, {}, dependencies(invoker));

      expect(exitCode).toBe(EXIT_CODE.ERROR);
    });

    it('reports a file that cannot be opened', async () => {
      const invoker = new ImmediateInvoker(succeeded());

      const exitCode = await toolchainCommand(
        'build',
        path.join(tempDir, 'missing.go'),
        {},
        dependencies(invoker)
      );

      expect(exitCode).toBe(EXIT_CODE.ERROR);
      expect(display.showError).toHaveBeenCalledWith(
        expect.stringMatching(/^Error opening file: ENOENT/)
      );
      expect(invoker.requests).toHaveLength(0);
    });

    it('reports configuration errors', async () => {
      load.mockRejectedValue(new Error('Invalid configuration:\n  - root: bad'));
      const invoker = new ImmediateInvoker(succeeded());

      const exitCode = await toolchainCommand('build', filePath, {}, dependencies(invoker));

      expect(exitCode).toBe(EXIT_CODE.ERROR);
      expect(display.showError).toHaveBeenCalledWith(
        'Invalid configuration:\n  - root: bad'
      );
    });
  });
});
