import { PeerAgent } from '../core/agent';
import { MeshError, Result } from '../core/errors';

const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const CYAN = '\x1b[36m';
const YELLOW = '\x1b[33m';
const RESET = '\x1b[0m';

export const COMMAND_HELP = [
    '  peers              List active peers',
    '  myfiles            List your shared files',
    '  share <filename>   Share a file from your directory',
    '  find <pattern>     Search the network for files',
    '  remove <filename>  Stop sharing a file',
    '  fetch <filename>   Download a file from a peer',
    '  quit               Exit',
].join('\n');

export type CommandOutcome = 'continue' | 'quit';

const PROGRESS_STEP = 10;

function percent(done: number, total: number): number {
    return total === 0 ? 100 : Math.floor((done * 100) / total);
}

/**
 * Interactive surface of a peer agent. Turns command lines into agent calls and
 * renders their results; the agent itself never prints user-facing text.
 */
export class CLI {
    // last printed percentage per transfer
    private progress: Map<string, number> = new Map();

    constructor(private agent: PeerAgent, private print: (line: string) => void = console.log) { }

    /** Prints upload and download progress of the agent's transfers. */
    public watchTransfers(): void {
        this.agent.on('upload:progress', (e: { requester: string, filename: string, sent: number, total: number }) =>
            this.renderProgress(`up:${e.requester}:${e.filename}`, 'UPLOAD', `${e.filename} to ${e.requester}`, e.sent, e.total));
        this.agent.on('download:progress', (e: { filename: string, received: number, total: number }) =>
            this.renderProgress(`down:${e.filename}`, 'DOWNLOAD', e.filename, e.received, e.total));
    }

    public async login(username: string, password: string): Promise<boolean> {
        const result = await this.agent.authenticate(username, password);
        if (!result.ok) {
            this.error(`Authentication failed: ${result.error.message}`);
            return false;
        }
        this.print(`${GREEN}[SYSTEM]${RESET} Welcome to the mesh, ${YELLOW}${username}${RESET}!`);
        this.print(`Available commands:\n${COMMAND_HELP}`);
        return true;
    }

    public async execute(line: string): Promise<CommandOutcome> {
        const input = line.trim();
        const space = input.indexOf(' ');
        const cmd = space === -1 ? input : input.slice(0, space);
        const arg = space === -1 ? '' : input.slice(space + 1).trim();

        switch (cmd) {
            case '':
                break;
            case 'peers':
                this.renderList(await this.agent.listPeers(), 'active peers', 'No active peers');
                break;
            case 'myfiles':
                this.renderList(await this.agent.listFiles(), 'file shared', 'No files shared');
                break;
            case 'find':
                this.renderList(await this.agent.search(arg), 'files found', 'No files found');
                break;
            case 'share':
                if (!this.requireArg(cmd, arg, '<filename>')) break;
                this.render(await this.agent.share(arg), () => 'File shared successfully');
                break;
            case 'remove':
                if (!this.requireArg(cmd, arg, '<filename>')) break;
                this.render(await this.agent.remove(arg), (removed) =>
                    removed ? 'File successfully removed from sharing' : 'File removal failed');
                break;
            case 'fetch':
                if (!this.requireArg(cmd, arg, '<filename>')) break;
                this.render(await this.agent.fetch(arg), (outcome) =>
                    `${GREEN}[COMPLETE]${RESET} ${arg} downloaded from ${YELLOW}${outcome.from.username}${RESET} (${outcome.bytes} bytes)`);
                break;
            case 'quit':
                this.print('Goodbye!');
                return 'quit';
            default:
                this.print(`Command '${cmd}' not recognized. Available commands:\n${COMMAND_HELP}`);
        }
        return 'continue';
    }

    private renderProgress(key: string, tag: string, subject: string, done: number, total: number): void {
        const pct = percent(done, total);
        const last = this.progress.get(key) ?? 0;
        if (pct < 100 && pct - last < PROGRESS_STEP) return;

        if (pct >= 100) this.progress.delete(key);
        else this.progress.set(key, pct);
        this.print(`${CYAN}[${tag}]${RESET} ${subject} ${pct}%`);
    }

    private renderList(result: Result<string[]>, header: string, empty: string): void {
        this.render(result, (names) => names.length === 0
            ? empty
            : `${CYAN}${names.length} ${header}:${RESET}\n${names.join('\n')}`);
    }

    private render<T>(result: Result<T>, format: (value: T) => string): void {
        if (result.ok) this.print(format(result.value));
        else this.error(describe(result.error));
    }

    private requireArg(cmd: string, arg: string, usage: string): boolean {
        if (arg) return true;
        this.error(`Usage: ${cmd} ${usage}`);
        return false;
    }

    private error(message: string): void {
        this.print(`${RED}[ERROR]${RESET} ${message}`);
    }
}

function describe(error: MeshError): string {
    switch (error.code) {
        case 'TIMEOUT':
            return 'Coordinator did not respond, try again';
        case 'CONNECT_TIMEOUT':
            return `Timed out connecting to peer (${error.message})`;
        default:
            return error.message;
    }
}
