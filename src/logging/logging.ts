import { config as winstonConfig, createLogger, format, transports, Logger } from "winston";
import { INFO } from "./log-levels";
import { hostname } from "os";

let logger: Logger | undefined = undefined;

export function initializeLogging(identifier: string, level: string = INFO): Logger {
    const defaultMetadata = {
        instance: hostname(),
        service: identifier,
    };

    logger = createLogger({
        levels: winstonConfig.syslog.levels,
        level: level,
        format: format.combine(
            format.errors({ stack: true }),
            format.timestamp({
                format: "YYYY-MM-DD HH:mm:ss.ms",
            }),
            format.splat(),
            format.printf((info) => {
                let logMessage = `${info.level.toUpperCase()} [${String(info.timestamp)}] ${String(info.message)}`;
                if (info.stack) {
                    // Append stack trace if available
                    logMessage += `\n${String(info.stack)}`;
                }
                return logMessage;
            }),
        ),
        defaultMeta: defaultMetadata,
        transports: [new transports.Console()],
    });

    return logger;
}

export function getLogger(): Logger | undefined {
    return logger;
}
