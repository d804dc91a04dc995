#!/usr/bin/env node
import 'dotenv/config';
import { Console } from 'node:console';
import { runCli } from './cli';
import { getSystemLocale, loadConfig } from './config';
import { resolveAppLanguage, setAppLanguage } from './i18n';
import { SidecarEngine } from './services/sidecarEngine';
import { AppConfig } from './types/transcript';
import { toErrorMessage } from './utils/errorHandling';

// stdout carries only the JSON result and queue lines; diagnostics go to stderr.
globalThis.console = new Console({ stdout: process.stderr, stderr: process.stderr });

async function main(): Promise<number> {
    let config: AppConfig;
    try {
        config = loadConfig();
    } catch (error) {
        process.stderr.write(`${toErrorMessage(error)}\n`);
        return 1;
    }

    setAppLanguage(resolveAppLanguage(config.appLanguage, getSystemLocale()));

    const engine = new SidecarEngine({ command: config.engineCommand, args: config.engineArgs });
    return runCli(process.argv.slice(2), { config, engine });
}

main().then(
    (code) => {
        process.exitCode = code;
    },
    (error: unknown) => {
        process.stderr.write(`Unknown error: ${toErrorMessage(error)}\n`);
        process.exitCode = 1;
    }
);
