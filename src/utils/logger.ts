import * as winston from "winston";
import * as path from "node:path";
import * as fs from "node:fs";
import Transport from "winston-transport";
import axios from "axios";
import Config from "../core/config/index";

// --- `notify` sits between warn and info: operator attention, not an error ---
const customLogLevels = {
  levels: {
    error: 0,
    warn: 1,
    notify: 2,
    info: 3,
    http: 4,
    verbose: 5,
    debug: 6,
    silly: 7,
  },
  colors: {
    error: "red",
    warn: "yellow",
    notify: "blue",
    info: "green",
    http: "magenta",
    verbose: "cyan",
    debug: "white",
    silly: "grey",
  },
};

export interface ReportLogger extends winston.Logger {
  notify: winston.LeveledLogMethod;
}

winston.addColors(customLogLevels.colors);

const logsDir = path.resolve(process.cwd(), Config.LOG_DIR);
const archiveDir = path.join(logsDir, "archive");
const logFiles = ["error.log", "info.log", "combined.log"];

// Move the previous run's logs aside so each process start begins with empty files
function archiveOldLogs() {
  fs.mkdirSync(archiveDir, { recursive: true });

  const timestamp = new Date().toISOString().replace(/[:.]/g, "-");

  for (const logFile of logFiles) {
    const logPath = path.join(logsDir, logFile);
    if (!fs.existsSync(logPath) || fs.statSync(logPath).size === 0) {
      continue;
    }
    try {
      const archivePath = path.join(archiveDir, `${timestamp}_${logFile}`);
      fs.copyFileSync(logPath, archivePath);
      fs.truncateSync(logPath, 0);
    } catch (err) {
      console.error(`Failed to archive ${logFile}:`, err);
    }
  }
}
archiveOldLogs();

function convertJsToTsPath(jsPath: string): string {
  if (jsPath.endsWith(".ts")) {
    return jsPath;
  }
  return jsPath.replace(/\/dist\//, "/src/").replace(/\.js$/, ".ts");
}

function getCallerInfo() {
  const originalStackTraceLimit = Error.stackTraceLimit;
  Error.stackTraceLimit = 20;
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, getCallerInfo);
  const stackLines = holder.stack?.split("\n").slice(1) || [];
  Error.stackTraceLimit = originalStackTraceLimit;

  for (const line of stackLines) {
    const match = line.match(/\(([^:]+):(\d+):\d+\)/) || line.match(/at\s+([^:]+):(\d+):\d+/);
    if (!match) {
      continue;
    }
    const [, file, lineNumber] = match;
    if (
      file.includes("node_modules/winston") ||
      file.includes("node_modules/logform") ||
      file.includes("node_modules/readable-stream") ||
      file.includes("internal/") ||
      file.includes("node:") ||
      file.includes("/utils/logger") ||
      file.includes("_stream_transform.js")
    ) {
      continue;
    }
    const functionMatch = line.match(/at\s+([^(]+)\s+\(/);
    return {
      file: convertJsToTsPath(file),
      line: Number.parseInt(lineNumber, 10),
      function: functionMatch?.[1]?.trim() || "anonymous",
    };
  }
  return { file: "unknown", line: 0, function: "anonymous" };
}

const fileAndLine = winston.format((info) => {
  const stackInfo = getCallerInfo();
  if (stackInfo.file !== "unknown") {
    const projectPath = stackInfo.file.replace(process.cwd(), "");
    const relativePath = projectPath.startsWith("/") ? projectPath.substring(1) : projectPath;
    info.logpath = `${relativePath}:${stackInfo.line}`;
    info.function = stackInfo.function;
  } else {
    info.logpath = "unknown:0";
    info.function = "anonymous";
  }
  return info;
});

// ---------------------------------------------------------
// Webhook alerts (Discord-compatible embed payload)
// ---------------------------------------------------------
interface WebhookAlertTransportOptions extends Transport.TransportStreamOptions {
  webhookUrl: string;
}

interface AlertInfo {
  level: string;
  message: unknown;
  function?: unknown;
  logpath?: unknown;
  timestamp?: unknown;
}

export class WebhookAlertTransport extends Transport {
  private webhookUrl: string;

  constructor(opts: WebhookAlertTransportOptions) {
    super(opts);
    this.webhookUrl = opts.webhookUrl;
  }

  log(info: AlertInfo, callback: () => void) {
    setImmediate(() => {
      this.emit("logged", info);
    });

    if (info.level === "error" || info.level === "notify") {
      void this.sendAlert(info);
    }

    callback();
  }

  async sendAlert(info: AlertInfo): Promise<void> {
    const isError = info.level === "error";
    const payload = {
      username: "Energy Report Scheduler",
      embeds: [
        {
          title: isError
            ? `ERROR: ${String(info.function ?? "Unknown Context")}`
            : `NOTIFICATION: ${String(info.function ?? "General")}`,
          description: `**Message:**\n${String(info.message)}`,
          color: isError ? 15158332 : 3447003,
          fields: [
            { name: "Source", value: String(info.logpath ?? "unknown:0"), inline: true },
            { name: "Time", value: String(info.timestamp ?? new Date().toISOString()), inline: true },
          ],
          footer: { text: isError ? "System Alert" : "System Notification" },
        },
      ],
    };

    try {
      await axios.post(this.webhookUrl, payload, { timeout: 10000 });
    } catch (error) {
      // Logging through winston here would feed the failure back into this transport
      console.error("Failed to send log alert to webhook:", error instanceof Error ? error.message : error);
    }
  }
}

const transportsList: winston.transport[] = [
  new winston.transports.File({ filename: path.join(logsDir, "error.log"), level: "error" }),
  new winston.transports.File({ filename: path.join(logsDir, "info.log"), level: "info" }),
  new winston.transports.File({ filename: path.join(logsDir, "combined.log") }),
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf((info) => {
        const meta = Object.entries(info).filter(
          ([key]) => !["level", "message", "timestamp", "logpath", "function"].includes(key)
        );
        const suffix = meta.length > 0 ? ` ${JSON.stringify(Object.fromEntries(meta))}` : "";
        return `${String(info.timestamp)} [${String(info.logpath)}] ${info.level}: ${String(info.message)}${suffix}`;
      }),
    ),
  }),
];

if (Config.ALERT_WEBHOOK_URL && Config.ENABLE_WEBHOOK_ALERTS) {
  transportsList.push(new WebhookAlertTransport({ webhookUrl: Config.ALERT_WEBHOOK_URL }));
}

export const logger = winston.createLogger({
  level: Config.LOG_LEVEL,
  levels: customLogLevels.levels,
  format: winston.format.combine(
    fileAndLine(),
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports: transportsList,
}) as ReportLogger;
