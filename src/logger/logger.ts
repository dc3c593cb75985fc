import pino from "pino";

const requested = process.env.LOG_LEVEL?.trim().toLowerCase() ?? "";
const logLevel = Object.hasOwn(pino.levels.values, requested) || requested === "silent" ? requested : "info";
const isDev = process.stderr.isTTY === true;

// stdout belongs to the embedding application; diagnostics go to stderr.
export const log = isDev
  ? pino({
      level: logLevel,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, destination: 2 },
      },
    })
  : pino({ level: logLevel }, pino.destination(2));
