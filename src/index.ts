#!/usr/bin/env node
import 'dotenv/config';
import * as readline from 'readline';
import { CLI } from './cli/commands';
import { PeerAgent } from './core/agent';
import { CONFIG, loadCredentials, parsePort, resolveCredentialsPath } from './core/config';
import { Coordinator } from './core/coordinator';
import { describeError } from './core/errors';
import { log } from './core/log';
import { ControlServer } from './network/control-server';
import { WebDashboard } from './web/server';

function usage(): string {
    return [
        'Usage:',
        '  filemesh coordinator <port> [--credentials <file>] [--dashboard]',
        '  filemesh peer <coordinator-port> [--coordinator-host <host>]',
    ].join('\n');
}

function option(args: string[], name: string): string | undefined {
    const i = args.indexOf(name);
    return i === -1 ? undefined : args[i + 1];
}

async function runCoordinator(args: string[]) {
    const port = parsePort(args[0], 'port');
    const credentialsFile = resolveCredentialsPath(option(args, '--credentials'));
    const credentials = loadCredentials(credentialsFile);
    log.success('CONFIG', `Loaded ${credentials.size} credential(s) from ${credentialsFile}`);

    const coordinator = new Coordinator(credentials);
    const server = new ControlServer(coordinator, CONFIG.NETWORK.HOST, port);
    const bound = await server.start();

    let dashboard: WebDashboard | null = null;
    if (args.includes('--dashboard')) {
        dashboard = new WebDashboard(coordinator, bound + CONFIG.NETWORK.DASHBOARD_PORT_OFFSET, CONFIG.NETWORK.HOST);
        await dashboard.start();
    }

    const shutdown = async () => {
        log.info('SYSTEM', 'Shutting down coordinator');
        await dashboard?.stop();
        await server.stop();
        process.exit(0);
    };
    process.once('SIGINT', () => { shutdown().catch(fatal); });
    process.once('SIGTERM', () => { shutdown().catch(fatal); });
}

async function runPeer(args: string[]) {
    const coordinatorPort = parsePort(args[0], 'coordinator port');
    const agent = new PeerAgent({
        coordinatorHost: option(args, '--coordinator-host') ?? CONFIG.NETWORK.HOST,
        coordinatorPort,
    });
    await agent.start();
    const cli = new CLI(agent);
    cli.watchTransfers();

    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
        prompt: 'mesh> '
    });
    const ask = (question: string) => new Promise<string>((resolve) => rl.question(question, resolve));

    let closing = false;
    const quit = async () => {
        if (closing) return;
        closing = true;
        await agent.shutdown();
        rl.close();
        process.exit(0);
    };
    rl.on('close', () => { quit().catch(fatal); });

    console.log(`\x1b[32m[SYSTEM]\x1b[0m Coordinator at ${option(args, '--coordinator-host') ?? CONFIG.NETWORK.HOST}:${coordinatorPort}`);
    while (!agent.username) {
        const username = (await ask('Enter username: ')).trim();
        const password = (await ask('Enter password: ')).trim();
        await cli.login(username, password);
    }

    rl.prompt();
    for await (const line of rl) {
        if (await cli.execute(line) === 'quit') {
            await quit();
            return;
        }
        rl.prompt();
    }
}

function fatal(err: unknown): never {
    log.error('FATAL', describeError(err));
    process.exit(1);
}

async function bootstrap() {
    const [command, ...args] = process.argv.slice(2);

    if (command === 'coordinator') {
        await runCoordinator(args);
    } else if (command === 'peer') {
        await runPeer(args);
    } else {
        console.log(usage());
        process.exit(command ? 1 : 0);
    }
}

bootstrap().catch(fatal);
