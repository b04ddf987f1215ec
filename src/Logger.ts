import type { TplConfig } from './config.js';

export class Logger {
    constructor(private config: Pick<TplConfig, 'verbose'>) {}

    public warn(message: string): void {
        console.log(`[WARN] ${message}`);
    }

    public debug(message: string): void {
        if (this.config.verbose) {
            console.log(`[DEBUG] ${message}`);
        }
    }
}
