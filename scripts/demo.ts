/*
 * Walks through the linked list operations, logging each step. Configuration is read from the environment (and a
 * .env file, if present): LINKED_LIST_LOG_LEVEL and LINKED_LIST_CONCAT_POLICY.
 */
import * as dotenv from "dotenv";

import { loadConfig } from "../src/config/list-config";
import { NOTICE } from "../src/logging/log-levels";
import { initializeLogging } from "../src/logging/logging";
import { IndexOutOfRangeError } from "../src/util/errors";
import { LinkedList } from "../src/util/linked-list";

dotenv.config();

function main() {
    const config = loadConfig();
    const logger = initializeLogging("linked-list-demo", config.logLevel);

    const list = new LinkedList<number>({ concatPolicy: config.concatPolicy });
    list.addAll([1, 2, 3]);
    logger.info("After adding 1, 2, 3: " + list.toString());

    list.insert(1, 9);
    logger.info("After insert(1, 9): " + list.toString());

    logger.info("removeAt(0) returned " + list.removeAt(0) + ": " + list.toString());

    list.subtract(2);
    logger.info("After subtracting 2: " + list.toString());

    const other = LinkedList.from([4, 5], { concatPolicy: config.concatPolicy });
    list.concat(other);
    logger.log(NOTICE, "After concat (" + config.concatPolicy + "): " + list.toString() + ", other: " + other.toString());

    logger.info("Squares: " + list.map((value) => value * value).toString());
    logger.info("Even values: " + list.where((value) => value % 2 === 0).toString());

    try {
        list.get(list.length);
    } catch (e) {
        if (!(e instanceof IndexOutOfRangeError)) {
            throw e;
        }
        logger.info("Reading past the end fails: " + e.message);
    }
}

try {
    main();
} catch (error) {
    console.error(error);
    process.exit(1);
}
