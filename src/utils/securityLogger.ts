import { config } from '../config/captcha';

export type LogLevel = 'INFO' | 'WARN' | 'ERROR' | 'CRITICAL';

export interface SecurityLogEvent {
    type: string;
    level: LogLevel;
    message: string;
    sessionId?: string | number;
    zoom?: number;
    ip?: string;
    details?: unknown;
    timestamp?: string;
}

function serializeError(error: unknown): unknown {
    if (error instanceof Error) {
        const { cause } = error;
        return {
            name: error.name,
            message: error.message,
            stack: error.stack,
            ...(cause === undefined ? {} : { cause: serializeError(cause) }),
        };
    }
    return error;
}

export class SecurityLogger {
    static log(event: SecurityLogEvent) {
        const logEntry = {
            timestamp: new Date().toISOString(),
            environment: config.environment,
            ...event
        };

        // One JSON object per line for log shippers
        console.log(JSON.stringify(logEntry));
    }

    static info(message: string, context: Partial<SecurityLogEvent> = {}) {
        this.log({ type: 'GENERAL', level: 'INFO', message, ...context });
    }

    static warn(message: string, context: Partial<SecurityLogEvent> = {}) {
        this.log({ type: 'SECURITY_WARNING', level: 'WARN', message, ...context });
    }

    static error(message: string, error?: unknown, context: Partial<SecurityLogEvent> = {}) {
        this.log({
            type: 'ERROR',
            level: 'ERROR',
            message,
            details: serializeError(error),
            ...context
        });
    }

    static critical(message: string, context: Partial<SecurityLogEvent> = {}) {
        this.log({ type: 'SECURITY_CRITICAL', level: 'CRITICAL', message, ...context });
    }
}

export default SecurityLogger;
