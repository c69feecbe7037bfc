import { CONFIG } from '../core/config';
import { log } from '../core/log';
import { ControlClient } from './control-client';

/**
 * Sends STATUS for one authenticated session: once immediately, then every
 * interval until the session's signal aborts or `stop` is called.
 */
export class Heartbeat {
    private interval?: NodeJS.Timeout;

    constructor(
        private control: ControlClient,
        private intervalMs: number = CONFIG.TIMING.HEARTBEAT_INTERVAL_MS
    ) { }

    public get running(): boolean {
        return this.interval !== undefined;
    }

    public start(username: string, signal: AbortSignal): void {
        if (signal.aborted) return;
        this.stop();

        const beat = () => this.control.notify({ type: 'STATUS', username });
        beat();
        this.interval = setInterval(beat, this.intervalMs);
        signal.addEventListener('abort', () => this.stop(), { once: true });
        log.debug('HEARTBEAT', `Started for ${username} every ${this.intervalMs}ms`);
    }

    public stop(): void {
        if (!this.interval) return;
        clearInterval(this.interval);
        this.interval = undefined;
        log.debug('HEARTBEAT', 'Stopped');
    }
}
