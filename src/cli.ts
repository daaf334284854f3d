#!/usr/bin/env -S npx tsx
// tapedb - interactive step debugger for brainfuck programs
// Run:  npx tsx src/cli.ts [file.bf]

import * as path from "node:path";
import * as readline from "node:readline";
import {DebuggerConsole, PROMPT} from "./debugger/debugger-console.ts";
import {DebuggerSession} from "./debugger/debugger-session.store.ts";
import {logService} from "./services/log.service.ts";
import {ProgramIOStore} from "./stores/program-io.store.ts";
import {DEFAULT_SETTINGS_FILE, JsonFileStorage, SettingsStore} from "./stores/settings.store.ts";

async function main(args: string[]) {
    // Warnings always, the rest once verbose mode is on
    let verbose = false;
    logService.entries.subscribe(entry => {
        if (verbose || entry.level === 'warn' || entry.level === 'error') {
            console.error(`[${entry.level}] ${entry.message}`);
        }
    });

    const configPath = process.env.TAPEDB_CONFIG ?? path.resolve(DEFAULT_SETTINGS_FILE);
    const settingsStore = new SettingsStore(new JsonFileStorage(configPath));
    settingsStore.settings.subscribe(settings => {
        verbose = settings.development.verbose;
    });

    const io = new ProgramIOStore();
    const session = new DebuggerSession(io, settingsStore.settings);
    const debuggerConsole = new DebuggerConsole(session, io, {
        write: text => process.stdout.write(text),
        error: text => process.stderr.write(text),
        writeByte: byte => process.stdout.write(Uint8Array.of(byte))
    });

    if (args[0] !== undefined) {
        await debuggerConsole.loadFile(args[0]);
    }

    const isTTY = process.stdin.isTTY === true;
    const rl = readline.createInterface({
        input: process.stdin,
        output: isTTY ? process.stdout : undefined,
        terminal: isTTY
    });
    rl.setPrompt(PROMPT);

    const prompt = () => {
        const status = debuggerConsole.statusLine();
        if (status !== null) {
            process.stdout.write(`${status}\n`);
        }
        if (isTTY) {
            rl.prompt();
        } else {
            process.stdout.write(PROMPT);
        }
    };

    prompt();
    for await (const line of rl) {
        // Piped input: echo the command so the transcript reads like a session
        if (!isTTY) {
            process.stdout.write(`${line}\n`);
        }
        if (!await debuggerConsole.execute(line)) {
            break;
        }
        prompt();
    }

    rl.close();
    debuggerConsole.dispose();
}

main(process.argv.slice(2)).catch(error => {
    console.error(error);
    process.exitCode = 1;
});
