/**
 * Lifecycle logger
 *
 * Emits OpenTelemetry log records through the global logs API. Records are
 * dropped until the application registers a LoggerProvider, so the library
 * stays silent by default.
 *
 * @module logger
 */

import type { AnyValueMap } from "@opentelemetry/api-logs";
import { logs, SeverityNumber } from "@opentelemetry/api-logs";

export interface LoggerOptions {
    defaultAttributes?: AnyValueMap;
}

export interface Logger {
    info(message: string, attributes?: AnyValueMap): void;
    warn(message: string, attributes?: AnyValueMap): void;
    error(message: string, attributes?: AnyValueMap): void;
    debug(message: string, attributes?: AnyValueMap): void;
}

export function getLogger(name: string, options?: LoggerOptions): Logger {
    const defaultAttrs = options?.defaultAttributes;

    function buildAttributes(callAttributes?: AnyValueMap): AnyValueMap {
        const base: AnyValueMap = { "logger.name": name, ...defaultAttrs };
        return callAttributes ? { ...base, ...callAttributes } : base;
    }

    function emitLog(severityNumber: SeverityNumber, severityText: string, message: string, attributes?: AnyValueMap): void {
        // Resolved per call: the provider may be registered after this module loads
        logs.getLogger(name).emit({
            severityNumber,
            severityText,
            body: message,
            attributes: buildAttributes(attributes),
        });
    }

    return {
        info(message, attributes?) {
            emitLog(SeverityNumber.INFO, "INFO", message, attributes);
        },
        warn(message, attributes?) {
            emitLog(SeverityNumber.WARN, "WARN", message, attributes);
        },
        error(message, attributes?) {
            emitLog(SeverityNumber.ERROR, "ERROR", message, attributes);
        },
        debug(message, attributes?) {
            emitLog(SeverityNumber.DEBUG, "DEBUG", message, attributes);
        },
    };
}
