#!/usr/bin/env node
/**
 * Main entry point for the application. Loads configuration, opens the store and starts the console.
 */

import { AnnotationApp } from './App.js';
import { BuildEngine, OpenStore } from './App/Boot.js';
import { DescribeError } from './Common/Errors.js';
import { log, SetLogLevel } from './Common/Log.js';
import { MAIN_EVENT_BUS } from './Events/MainEventBus.js';
import { ConfigService, DescribeCategory } from './Services/ConfigService.js';

async function main(): Promise<void> {
    const configService = new ConfigService(MAIN_EVENT_BUS);
    const config = await configService.Load(configService.ResolvePath());
    SetLogLevel(config.logLevel);

    for (const [name, category] of Object.entries(config.categories)) {
        log.debug(DescribeCategory(name, category), `Main`);
    }
    const handle = await OpenStore(config);
    const app = new AnnotationApp(BuildEngine(config, handle, MAIN_EVENT_BUS), MAIN_EVENT_BUS);
    await app.Start();
}

main().catch(err => {
    log.critical(`Fatal error during application startup: ${DescribeError(err)}`, `Main`);
    process.exitCode = 1;
});
