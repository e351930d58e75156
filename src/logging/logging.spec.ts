import { assert } from "chai";
import { Writable } from "stream";
import { config as winstonConfig, createLogger, format, transports } from "winston";
import { LinkedList } from "../util/linked-list";
import { DEBUG, WARNING } from "./log-levels";
import { getLogger, initializeLogging } from "./logging";

function waitForTransports(): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, 20));
}

describe("Logging tests", () => {
    it("initializeLogging installs the shared logger", () => {
        const logger = initializeLogging("logging-spec", WARNING);

        assert.strictEqual(getLogger(), logger);
        assert.equal(logger.level, WARNING);
        assert.deepEqual(logger.levels, winstonConfig.syslog.levels);
    });

    it("lists log structural changes at debug level", async () => {
        const lines: string[] = [];
        const stream = new Writable({
            write(chunk, _encoding, callback) {
                lines.push(String(chunk).trim());
                callback();
            },
        });
        const logger = createLogger({
            levels: winstonConfig.syslog.levels,
            level: DEBUG,
            format: format.printf((info) => `${info.level}: ${String(info.message)}`),
            transports: [new transports.Stream({ stream })],
        });

        const list = LinkedList.from([1, 2, 3], { logger });
        list.subtract(2);
        list.concat(LinkedList.from([4]));
        assert.throws(() => list.get(9));

        await waitForTransports();

        assert.deepEqual(lines, [
            "debug: Removed element at index 1",
            "debug: Moving 1 node(s) onto a list of length 2",
            "debug: Rejecting index 9 for a list of length 3",
        ]);
    });
});
