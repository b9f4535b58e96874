import pino from "pino";
import dotenv from "dotenv";

dotenv.config({
    quiet: process.env.NODE_ENV === 'test',
});

const env = process.env.NODE_ENV;
const defaultLevel = env === "test" ? "silent" : env === "development" ? "debug" : "info";

// LOG_LEVEL wins over the NODE_ENV default
export const logger = pino({
    name: "weather-history",
    level: process.env.LOG_LEVEL ?? defaultLevel,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { pid: process.pid },
    transport: env === "development"
        ? {
            target: "pino-pretty",
            options: {
                colorize: true,
                translateTime: "yyyy-mm-dd HH:MM:ss",
                ignore: "pid,hostname,name",
            },
        }
        : undefined,
});
