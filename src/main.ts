#!/usr/bin/env node
import { demoApp } from './apps/demo.js';
import { loadConfig } from './config/load.js';
import { LifecycleFailure, errorMessage } from './errors.js';
import { importApplication } from './importer.js';
import { Server } from './lifecycle/server.js';
import { closeLogStream, configureLogging, getLogger } from './logging/logger.js';

const STARTUP_FAILURE = 3;

const logger = getLogger('main');

async function main() {
  const config = loadConfig();
  configureLogging({ level: config.logLevel, file: config.logFile });

  const appSpec = process.env.TIDEWATER_APP;
  const app = appSpec ? await importApplication(appSpec) : demoApp;
  const server = new Server(app, config);
  try {
    await server.serve();
  } catch (e: unknown) {
    if (!(e instanceof LifecycleFailure)) throw e;
    process.exitCode = STARTUP_FAILURE;
  }
  if (server.signal) logger.debug(`Stopped by ${server.signal}`);
}

void main()
  .catch((e: unknown) => {
    console.error(`[MAIN] ${errorMessage(e)}`);
    process.exitCode = 1;
  })
  .finally(() => closeLogStream());
