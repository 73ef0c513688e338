import assert from "node:assert";
import { afterEach, beforeEach, describe, it } from "node:test";
import type { LogRecord, Logger as OtelLogger, LoggerProvider } from "@opentelemetry/api-logs";
import { logs, SeverityNumber } from "@opentelemetry/api-logs";
import { getLogger } from "../../src/logger.ts";

interface CapturedRecord {
    loggerName: string;
    record: LogRecord;
}

function installCapture(): CapturedRecord[] {
    const records: CapturedRecord[] = [];
    const provider: LoggerProvider = {
        getLogger(name: string): OtelLogger {
            return {
                emit(record: LogRecord) {
                    records.push({ loggerName: name, record });
                },
            };
        },
    };
    logs.setGlobalLoggerProvider(provider);
    return records;
}

function firstRecord(records: CapturedRecord[]): CapturedRecord {
    const captured = records[0];
    assert.ok(captured, "Expected at least one emitted record");
    return captured;
}

describe("getLogger", () => {
    let records: CapturedRecord[];

    beforeEach(() => {
        logs.disable();
        records = installCapture();
    });

    afterEach(() => {
        logs.disable();
    });

    it("should emit info records with severity and body", () => {
        getLogger("test.logger").info("hello");

        assert.strictEqual(records.length, 1);
        const { record } = firstRecord(records);
        assert.strictEqual(record.severityNumber, SeverityNumber.INFO);
        assert.strictEqual(record.severityText, "INFO");
        assert.strictEqual(record.body, "hello");
    });

    it("should map every level", () => {
        const logger = getLogger("test.logger");

        logger.debug("d");
        logger.info("i");
        logger.warn("w");
        logger.error("e");

        assert.deepStrictEqual(
            records.map((r) => [r.record.severityNumber, r.record.severityText]),
            [
                [SeverityNumber.DEBUG, "DEBUG"],
                [SeverityNumber.INFO, "INFO"],
                [SeverityNumber.WARN, "WARN"],
                [SeverityNumber.ERROR, "ERROR"],
            ],
        );
    });

    it("should request the OpenTelemetry logger by name", () => {
        getLogger("drainguard.test").warn("x");

        assert.strictEqual(firstRecord(records).loggerName, "drainguard.test");
    });

    it("should attach logger name, default and call attributes", () => {
        const logger = getLogger("test.logger", { defaultAttributes: { component: "probe", shared: "default" } });

        logger.info("with attrs", { shared: "call", port: 8080 });

        assert.deepStrictEqual(firstRecord(records).record.attributes, {
            "logger.name": "test.logger",
            component: "probe",
            shared: "call",
            port: 8080,
        });
    });

    it("should pick up a provider registered after the logger was created", () => {
        logs.disable();
        const logger = getLogger("late");
        const late = installCapture();

        logger.info("after registration");

        assert.strictEqual(late.length, 1);
        assert.strictEqual(firstRecord(late).record.body, "after registration");
    });
});
