import { Command } from 'commander';
import { UsageError, type ConfigInput } from '@taskplanner/shared';
import { createPlannerServer, startServer, stopServer } from '@taskplanner/server';
import { createCliContext, type GlobalOptions } from '../context';
import { OutputRenderer } from '../output/renderer';

interface ServeCommandOptions {
  port?: string;
  host?: string;
}

export function serveFlags(options: ServeCommandOptions): ConfigInput {
  const server: NonNullable<ConfigInput['server']> = {};
  if (options.port !== undefined) {
    const port = Number(options.port);
    if (!/^\d+$/.test(options.port) || port > 65535) {
      throw new UsageError(`Invalid --port "${options.port}". Must be an integer 0-65535.`);
    }
    server.port = port;
  }
  if (options.host !== undefined) {
    server.host = options.host;
  }
  return Object.keys(server).length > 0 ? { server } : {};
}

function waitForShutdown(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

export function registerServeCommand(program: Command) {
  program
    .command('serve')
    .description('Start the HTTP API')
    .option('--port <port>', 'Port to listen on (default 5000)')
    .option('--host <host>', 'Interface to bind (default 0.0.0.0)')
    .action(async (options: ServeCommandOptions) => {
      const globals = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globals.json);
      const ctx = await createCliContext(globals, serveFlags(options));

      const server = createPlannerServer({ service: ctx.service, logger: ctx.logger });
      try {
        const address = await startServer(server, ctx.config.server);
        renderer.log(`Using method: ${ctx.service.method}`);
        if (ctx.service.method === 'fallback') {
          renderer.log('For LLM-generated plans, install Ollama and run: ollama pull llama2');
        }
        await ctx.logger.info(`Listening on http://${address.address}:${address.port}`);

        const signal = await waitForShutdown();
        await ctx.logger.info(`Received ${signal}, shutting down`);
        await stopServer(server);
      } finally {
        ctx.close();
      }
    });
}
