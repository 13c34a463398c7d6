import pino from 'pino';
import pretty from 'pino-pretty';
import { Writable } from 'stream';
import { AsyncLocalStorage } from 'async_hooks';
import chalk from 'chalk';

// --- Async context so tool-call logs carry their conversation ---
export const logContext = new AsyncLocalStorage<{ conversationId: string }>();

// --- Color Helper ---
const moduleColors: Record<string, chalk.Chalk> = {
  'System': chalk.magenta.bold,
  'Knowledge': chalk.cyan.bold,
  'Dispatcher': chalk.hex('#FFA500').bold, // Orange
  'Tools': chalk.green.bold,
  'Web': chalk.blue.bold,
  'Config': chalk.gray.bold,
};

const getColor = (moduleName: string): chalk.Chalk => {
  // Sub-modules (e.g. Tools:search_web) share the parent colour
  const baseModule = moduleName.split(':')[0];
  const known = moduleColors[baseModule] ?? moduleColors[moduleName];
  if (known) return known;

  // Hash to pick a consistent color
  const colors = [chalk.red, chalk.green, chalk.yellow, chalk.blue, chalk.magenta, chalk.cyan];
  let hash = 0;
  for (let i = 0; i < moduleName.length; i++) {
    hash = moduleName.charCodeAt(i) + ((hash << 5) - hash);
  }
  return colors[Math.abs(hash) % colors.length].bold;
};

const prettyStream = pretty({
  colorize: true,
  translateTime: 'SYS:standard',
  ignore: 'pid,hostname,module,conversationId',
  messageFormat: (log, messageKey) => {
    const raw = log[messageKey];
    const msg = typeof raw === 'string' ? raw : String(raw);
    const moduleName = typeof log.module === 'string' ? log.module : undefined;
    const conversation = typeof log.conversationId === 'string' ? chalk.dim(` (${log.conversationId})`) : '';

    if (moduleName) {
      const color = getColor(moduleName);
      return `${color(`[${moduleName}]`)}${conversation} ${msg}`;
    }
    return `${msg}${conversation}`;
  },
});

function tagLine(line: string, conversationId: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return line;
  }
  if (!parsed || typeof parsed !== 'object' || 'conversationId' in parsed) return line;
  return JSON.stringify({ ...parsed, conversationId }) + '\n';
}

// Tags each line with the active conversation before it reaches the pretty printer
const contextStream = new Writable({
  write(chunk: Buffer, encoding, callback) {
    const store = logContext.getStore();
    if (!store) {
      prettyStream.write(chunk, encoding, callback);
      return;
    }
    prettyStream.write(tagLine(chunk.toString(), store.conversationId), 'utf8', callback);
  },
});

const logger = pino(
  {
    level: process.env.LOG_LEVEL || 'info',
    base: { pid: false },
  },
  contextStream
);

export default logger;
