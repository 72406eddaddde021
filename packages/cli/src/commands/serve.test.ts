import { Command } from 'commander';
import { UsageError } from '@taskplanner/shared';
import { registerServeCommand, serveFlags } from './serve';

describe('serveFlags', () => {
  it('returns no overrides without options', () => {
    expect(serveFlags({})).toEqual({});
  });

  it('maps --port and --host onto server config', () => {
    expect(serveFlags({ port: '8080', host: '127.0.0.1' })).toEqual({
      server: { port: 8080, host: '127.0.0.1' },
    });
  });

  it.each(['abc', '-1', '70000', '80.5'])('rejects --port %s', (port) => {
    expect(() => serveFlags({ port })).toThrow(UsageError);
  });
});

describe('registerServeCommand', () => {
  it('registers the serve command with its options', () => {
    const program = new Command();
    registerServeCommand(program);
    const command = program.commands.find((c) => c.name() === 'serve');

    expect(command?.description()).toBe('Start the HTTP API');
    expect(command?.options.map((o) => o.long)).toEqual(['--port', '--host']);
  });
});
