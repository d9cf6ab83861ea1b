import fs from 'fs';
import debug from 'debug';

const ROOT_NAMESPACE = 'finding-lookup';

export function logger(area: string): debug.Debugger {
  return debug(`${ROOT_NAMESPACE}:${area}`);
}

/**
 * Sends every enabled namespace to a file instead of stderr. The adapter
 * uses this when LOOKUP_LOG_FILE is set, since its stdout is the protocol
 * channel.
 */
export function saveLogsToFile(fileName: string): fs.WriteStream {
  const namespaces = [`${ROOT_NAMESPACE}:*`, ...(process.env.DEBUG ? [process.env.DEBUG] : [])];
  debug.enable(namespaces.join(','));

  const logFile = fs.createWriteStream(fileName, { flags: 'a+' });
  debug.log = (...chunks: unknown[]) => {
    logFile.write(`${chunks.map(String).join(' ')}\n`);
  };
  logFile.on('error', error => {
    process.stderr.write(`[finding-lookup] cannot write log file ${fileName}: ${error.message}\n`);
    logFile.end();
  });
  return logFile;
}
