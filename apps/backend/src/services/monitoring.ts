// Service Monitoring
// Per-service request counters, response times and a periodic status log

import type { ServiceMetricsDTO, SystemMetricsDTO } from '@enrollment/contracts';
import { createLogger, type Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const MAX_RESPONSE_SAMPLES = 100;

export const CORE_SERVICES = ['voice', 'browser', 'email', 'workflow'] as const;

export type Clock = () => Date;

/**
 * Format elapsed seconds as "{d}d {h}h {m}m {s}s"
 */
export function formatUptime(totalSeconds: number): string {
    let seconds = Math.max(0, totalSeconds);
    const days = Math.floor(seconds / 86400);
    seconds -= days * 86400;
    const hours = Math.floor(seconds / 3600);
    seconds -= hours * 3600;
    const minutes = Math.floor(seconds / 60);
    seconds -= minutes * 60;
    return `${days}d ${hours}h ${minutes}m ${Math.floor(seconds)}s`;
}

export class ServiceMetrics {
    readonly startTime: Date;
    requestsTotal = 0;
    requestsSuccess = 0;
    requestsError = 0;
    readonly responseTimes: number[] = [];
    lastError: string | null = null;
    lastErrorTime: Date | null = null;

    constructor(
        readonly serviceName: string,
        private readonly clock: Clock = () => new Date()
    ) {
        this.startTime = clock();
    }

    get uptimeSeconds(): number {
        return (this.clock().getTime() - this.startTime.getTime()) / 1000;
    }

    get uptimeFormatted(): string {
        return formatUptime(this.uptimeSeconds);
    }

    /** Average of the retained response times in ms, null without samples */
    get avgResponseTime(): number | null {
        if (this.responseTimes.length === 0) return null;
        const sum = this.responseTimes.reduce((acc, value) => acc + value, 0);
        return sum / this.responseTimes.length;
    }

    /** Success percentage, null before the first request */
    get successRate(): number | null {
        if (this.requestsTotal === 0) return null;
        return (this.requestsSuccess / this.requestsTotal) * 100;
    }

    recordRequest(success: boolean, responseTimeMs: number, error?: string): void {
        this.requestsTotal++;

        if (success) {
            this.requestsSuccess++;
        } else {
            this.requestsError++;
            this.lastError = error ?? null;
            this.lastErrorTime = this.clock();
        }

        this.responseTimes.push(responseTimeMs);
        if (this.responseTimes.length > MAX_RESPONSE_SAMPLES) {
            this.responseTimes.shift();
        }
    }

    toJSON(): ServiceMetricsDTO {
        const successRate = this.successRate;
        const avg = this.avgResponseTime;

        return {
            serviceName: this.serviceName,
            startTime: this.startTime.toISOString(),
            uptime: this.uptimeFormatted,
            requests: {
                total: this.requestsTotal,
                success: this.requestsSuccess,
                error: this.requestsError,
                successRate: successRate === null ? 'N/A' : `${successRate.toFixed(2)}%`,
            },
            responseTime: {
                average: avg === null ? 'N/A' : `${avg.toFixed(2)}ms`,
                samples: this.responseTimes.length,
            },
            lastError: {
                message: this.lastError,
                time: this.lastErrorTime ? this.lastErrorTime.toISOString() : null,
            },
        };
    }
}

export class ServiceMonitor {
    private readonly services = new Map<string, ServiceMetrics>();
    readonly startTime: Date;
    private readonly logger: Logger;

    constructor(private readonly clock: Clock = () => new Date(), logger?: Logger) {
        this.startTime = clock();
        this.logger = logger ?? createLogger('monitor');
    }

    registerService(serviceName: string): ServiceMetrics {
        const existing = this.services.get(serviceName);
        if (existing) {
            this.logger.warn(`Service ${serviceName} already registered`);
            return existing;
        }

        const metrics = new ServiceMetrics(serviceName, this.clock);
        this.services.set(serviceName, metrics);
        this.logger.info(`Registered service for monitoring: ${serviceName}`);
        return metrics;
    }

    getServiceMetrics(serviceName: string): ServiceMetrics | undefined {
        return this.services.get(serviceName);
    }

    getAllMetrics(): Record<string, ServiceMetricsDTO> {
        const result: Record<string, ServiceMetricsDTO> = {};
        for (const [name, metrics] of this.services) {
            result[name] = metrics.toJSON();
        }
        return result;
    }

    recordRequest(serviceName: string, success: boolean, responseTimeMs: number, error?: string): void {
        let metrics = this.services.get(serviceName);
        if (!metrics) {
            this.logger.warn(`Service ${serviceName} not registered, registering now`);
            metrics = this.registerService(serviceName);
        }
        metrics.recordRequest(success, responseTimeMs, error);
    }

    getSystemMetrics(): SystemMetricsDTO {
        let totalRequests = 0;
        for (const metrics of this.services.values()) {
            totalRequests += metrics.requestsTotal;
        }

        return {
            startTime: this.startTime.toISOString(),
            uptime: (this.clock().getTime() - this.startTime.getTime()) / 1000,
            servicesCount: this.services.size,
            totalRequests,
        };
    }

    /**
     * Log one status line per service
     */
    logStatus(): void {
        for (const [name, metrics] of this.services) {
            const rate = metrics.successRate;
            const avg = metrics.avgResponseTime;
            this.logger.info(
                `Service ${name}: Uptime ${metrics.uptimeFormatted}, ` +
                `Requests ${metrics.requestsTotal}, ` +
                `Success rate ${rate === null ? 'N/A' : `${rate.toFixed(2)}%`}, ` +
                `Avg response time ${avg === null ? 'N/A' : `${avg.toFixed(2)}ms`}`
            );
        }
    }

    /**
     * Start the periodic status log
     * @returns stop function
     */
    startMonitorTask(intervalMs: number): () => void {
        this.logger.info(`Starting service monitoring task (every ${intervalMs}ms)`);

        const timer = setInterval(() => {
            try {
                this.logStatus();
            } catch (error) {
                this.logger.error('Error in monitoring task', undefined, error);
            }
        }, intervalMs);
        timer.unref();

        return () => {
            clearInterval(timer);
            this.logger.info('Service monitoring task stopped');
        };
    }
}

/**
 * Wrap an async function so every call is recorded against a service
 */
export function monitored<TArgs extends unknown[], TResult>(
    monitor: ServiceMonitor,
    serviceName: string,
    fn: (...args: TArgs) => Promise<TResult>
): (...args: TArgs) => Promise<TResult> {
    return async (...args: TArgs): Promise<TResult> => {
        const start = performance.now();
        try {
            const result = await fn(...args);
            monitor.recordRequest(serviceName, true, performance.now() - start);
            return result;
        } catch (error) {
            monitor.recordRequest(serviceName, false, performance.now() - start, errorMessage(error));
            throw error;
        }
    };
}
