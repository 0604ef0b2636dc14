#!/usr/bin/env node

import { addLog } from '@ticklog/shared/logger';
import { RunLoop, type RunSummary } from '@ticklog/core';
import { loadCliConfig } from './cli/config.js';
import { printCliUsage } from './cli/help.js';

const INTERRUPT_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

const runCli = async (argv: string[] = process.argv.slice(2)): Promise<RunSummary | null> => {
  const cfg = loadCliConfig(argv);
  if (cfg.kind === 'help') {
    printCliUsage();
    return null;
  }

  const controller = new AbortController();
  const interrupt = (signal: NodeJS.Signals) => {
    addLog(`[CLI] Received ${signal}, stopping after the current pause`);
    controller.abort();
  };
  for (const signal of INTERRUPT_SIGNALS) {
    process.on(signal, interrupt);
  }

  try {
    return await new RunLoop(cfg.run).run(controller.signal);
  } finally {
    for (const signal of INTERRUPT_SIGNALS) {
      process.removeListener(signal, interrupt);
    }
  }
};

runCli()
  .then(summary => {
    addLog(`[CLI] Exiting after ${summary ? summary.reason : 'help'}`);
    process.exitCode = 0;
  })
  .catch(error => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  });
