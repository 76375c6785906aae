#!/usr/bin/env node
/**
 * saf-packager entry point.
 * The first Ctrl-C cancels cooperatively; a second one exits at once.
 */

import { run } from './modules/cli.js';
import { Logger } from './modules/utilities.js';

const log = Logger.getLogger('main');
const controller = new AbortController();

process.on('SIGINT', () => {
    if (controller.signal.aborted) {
        process.exit(130);
    }
    log.warn('Cancelling; in-flight work will finish or abort. Press Ctrl-C again to exit now.');
    controller.abort();
});

process.exitCode = await run(process.argv.slice(2), { signal: controller.signal });
