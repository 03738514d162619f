import type { TaskStore } from '@taskdeck/domain';

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

function plural(count: number, unit: string): string {
    return count === 1 ? `1 ${unit}` : `${count} ${unit}s`;
}

/** Coarse human-readable uptime, e.g. "3 hours". */
export function formatDuration(ms: number): string {
    if (ms < MINUTE_MS) return 'less than a minute';
    if (ms < HOUR_MS) return plural(Math.floor(ms / MINUTE_MS), 'minute');
    if (ms < DAY_MS) return plural(Math.floor(ms / HOUR_MS), 'hour');
    return plural(Math.floor(ms / DAY_MS), 'day');
}

export interface HealthReport {
    status: 'healthy';
    version: string;
    timestamp: string;
    uptime: string;
}

export interface ReadinessReport {
    status: 'ready' | 'not_ready';
    checks: Record<string, string>;
    timestamp: string;
}

export interface LivenessReport {
    status: 'alive';
    timestamp: string;
    uptime: string;
}

export class HealthService {
    private readonly startedAt: number;

    constructor(
        private readonly store: TaskStore,
        private readonly version: string,
        private readonly now: () => Date = () => new Date(),
    ) {
        this.startedAt = this.now().getTime();
    }

    health(): HealthReport {
        const now = this.now();
        return {
            status: 'healthy',
            version: this.version,
            timestamp: now.toISOString(),
            uptime: formatDuration(now.getTime() - this.startedAt),
        };
    }

    async readiness(): Promise<ReadinessReport> {
        const checks: Record<string, string> = {
            task_store: await this.store.count().then(() => 'ok', () => 'unavailable'),
        };
        const ready = Object.values(checks).every((status) => status === 'ok');
        return { status: ready ? 'ready' : 'not_ready', checks, timestamp: this.now().toISOString() };
    }

    liveness(): LivenessReport {
        const now = this.now();
        return {
            status: 'alive',
            timestamp: now.toISOString(),
            uptime: formatDuration(now.getTime() - this.startedAt),
        };
    }
}
