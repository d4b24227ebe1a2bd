import pino from "pino";

// Use pino-pretty only when running the CLI in development
const isDev = process.env.NODE_ENV !== "production";
const isCLI = process.argv[1]?.includes("main") || process.argv[1]?.includes("tsx");
const level = process.env.LOG_LEVEL || "info";

export const logger = isDev && isCLI
  ? pino({
      level,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          ignore: "pid,hostname",
        },
      },
    })
  : pino({ level });
