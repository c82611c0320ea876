#!/usr/bin/env node

/**
 * Market Instance Solver - Entry Point
 */

import { getConfig, printConfigInfo } from './config.js';
import { SolverApp } from './application/SolverApp.js';

async function main() {
  let app: SolverApp | null = null;

  try {
    const config = getConfig();
    printConfigInfo(config);

    app = new SolverApp(config);
    app.printStats();

    const shutdown = async (signal: string) => {
      console.error(`\n\n📛 Received ${signal}, shutting down gracefully...`);
      if (app) {
        await app.shutdown();
      }
      console.error('👋 Goodbye!\n');
      process.exit(0);
    };

    process.on('SIGINT', () => {
      void shutdown('SIGINT');
    });
    process.on('SIGTERM', () => {
      void shutdown('SIGTERM');
    });

    process.on('unhandledRejection', (reason) => {
      console.error('💥 Unhandled Rejection, reason:', reason);
      void shutdown('UNHANDLED_REJECTION');
    });

    await app.start();

    if (config.solver.runOnce) {
      await app.shutdown();
    } else {
      console.error('\n🚀 Solver is running. Press Ctrl+C to stop.\n');
    }
  } catch (error) {
    console.error('💥 Fatal error in main():', error);
    if (app) {
      await app.shutdown();
    }
    process.exit(1);
  }
}

void main();
