import { EventEmitter } from 'events';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { AdvisoryOrchestrator } from '../application/orchestrators/AdvisoryOrchestrator';
import { AdvisoryCLI, SignalTarget } from '../cli/commands';
import { sleep } from '../utils/async';
import { FakeBehaviour, createTestLogger, fakeFactory, identity, marketContext } from './support/fakes';

function orchestratorWith(behaviours: Record<string, FakeBehaviour>) {
  const { factory } = fakeFactory(behaviours);
  const orchestrator = new AdvisoryOrchestrator({
    clientFactory: factory,
    credentials: () => 'test-key',
    logger: createTestLogger()
  });
  orchestrator.registerAll(Object.keys(behaviours).map((name) => identity(name)));
  return orchestrator;
}

function fakeProcess() {
  const emitter = new EventEmitter();
  const exit = jest.fn<void, [number]>();
  const target: SignalTarget = {
    once: (event, listener) => emitter.once(event, listener),
    exit
  };
  return { emitter, exit, target };
}

describe('AdvisoryCLI', () => {
  let log: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('shutdown', () => {
    it('does nothing before a session has started', () => {
      expect(new AdvisoryCLI().shutdown('SIGTERM')).toBe(false);
      expect(log).not.toHaveBeenCalled();
    });

    it('cancels an outstanding round on SIGINT and exits with 130', async () => {
      const orchestrator = orchestratorWith({
        A: (_call, signal) => sleep(5000, signal).then(() => 'never')
      });
      const cli = new AdvisoryCLI(orchestrator);
      const { emitter, exit, target } = fakeProcess();
      cli.installSignalHandlers(target, 0);

      const pending = orchestrator.askAll(marketContext());
      emitter.emit('SIGINT');
      const result = await pending;

      expect(result.outcomes[0]).toMatchObject({ advisor: 'A', status: 'error', error: { kind: 'Cancelled' } });
      expect(orchestrator.history('A').messages).toHaveLength(0);
      expect(log).toHaveBeenCalledTimes(1);

      await sleep(10);
      expect(exit).toHaveBeenCalledWith(130);
    });

    it('exits with 143 on SIGTERM', async () => {
      const { emitter, exit, target } = fakeProcess();
      new AdvisoryCLI().installSignalHandlers(target, 0);

      emitter.emit('SIGTERM');
      await sleep(10);

      expect(exit).toHaveBeenCalledTimes(1);
      expect(exit).toHaveBeenCalledWith(143);
    });
  });

  describe('ask', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'advisory-cli-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('prints the round as JSON', async () => {
      const file = path.join(dir, 'context.json');
      fs.writeFileSync(file, JSON.stringify(marketContext()));
      const cli = new AdvisoryCLI(orchestratorWith({ A: () => Promise.resolve('Stay flat.') }));

      await cli.run(['node', 'advisory', 'ask', file, '--json']);

      const printed: unknown = JSON.parse(String(log.mock.calls[log.mock.calls.length - 1][0]));
      expect(printed).toMatchObject({
        context: { symbol: 'BTCUSDT' },
        outcomes: [{ advisor: 'A', status: 'ok', reply: 'Stay flat.', attempts: 1 }],
        proposals: {}
      });
    });

    it('reports an unreadable context file and sets the exit code', async () => {
      const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      const cli = new AdvisoryCLI(orchestratorWith({ A: () => Promise.resolve('unused') }));

      await cli.run(['node', 'advisory', 'ask', path.join(dir, 'absent.json')]);

      expect(String(error.mock.calls[0][0])).toContain(`Cannot read market context from ${path.join(dir, 'absent.json')}`);
      expect(process.exitCode).toBe(1);
      process.exitCode = undefined;
    });
  });
});
