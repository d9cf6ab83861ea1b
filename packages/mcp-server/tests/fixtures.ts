import fs from 'fs';
import os from 'os';
import path from 'path';
import AdmZip from 'adm-zip';

export const FUNCTION_TREE = [
  '"main","/src/main.c",2,"fn_main",7,""',
  '"parse_packet","/src/net.c",1,"fn_parse",5,"fn_main"',
  '"read_header","/src/net.c",6,"fn_read",8,"fn_parse"',
  '"net::send_all","/src/net.c",9,"fn_send_all",11,"fn_main"',
  '"send","/src/net.c",12,"fn_send",14,"fn_send_all"',
  'broken,row',
  '"handle_request","/src/server.c",1,"fn_handle",4,"/src/main.c":5',
  '"unterminated,"/src/util.c",1,"fn_bad",2,"fn_main"',
];

export const MACROS = [
  '"MAX_LEN_LIMIT","(MAX_LEN * 2)"',
  '"MAX_LEN","512"',
  '"ns::WRAP","do { f(x); } while (0)"',
];

export const GLOBAL_VARS = [
  '"g_config","/src/config.c",1,1',
  '"g_config_path","/src/config.c",2,2',
  '"server::g_port","/src/config.c",3,3',
];

export const CLASSES = [
  '"struct","net::packet","/src/net.h",2,6,"packet"',
  '"class","app::Server","/src/server.h",1,3,"Server"',
];

export const SOURCES: Record<string, string[]> = {
  'src/main.c': [
    '#include "net.h"',
    'int main(void) {',
    '  struct packet p = {0};',
    '  if (parse_packet(&p) < 0)',
    '    return handle_request(&p);',
    '  return send_all(&p);',
    '}',
  ],
  'src/net.c': [
    'int parse_packet(struct packet *p) {',
    '  if (!p) return -1;',
    '  int rc = read_header(p);',
    '  return rc;',
    '}',
    'static int read_header(struct packet *p) {',
    '  return p->len > MAX_LEN ? -1 : 0;',
    '}',
    'int send_all(struct packet *p) {',
    '  return send(p);',
    '}',
    'int send(struct packet *p) {',
    '  return write(p->fd, p->buf, p->len);',
    '}',
  ],
  'src/server.c': [
    'int handle_request(struct packet *p) {',
    '  log_error(p);',
    '  return -1;',
    '}',
  ],
  'src/net.h': [
    '#define MAX_LEN 512',
    'struct packet {',
    '  int fd;',
    '  char *buf;',
    '  int len;',
    '};',
  ],
  'src/config.c': [
    'struct config g_config;',
    'const char *g_config_path = "/etc/app.conf";',
    'int g_port = 8080;',
  ],
};

export function makeTempDir(prefix = 'lookup-db-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeTable(dir: string, name: string, rows: string[]): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, rows.map(r => `${r}\n`).join(''), 'utf8');
  return file;
}

export function writeArchive(dir: string, sources: Record<string, string[]> = SOURCES): string {
  const zip = new AdmZip();
  for (const [entry, lines] of Object.entries(sources)) {
    zip.addFile(entry, Buffer.from(lines.join('\n') + '\n', 'utf8'));
  }
  const file = path.join(dir, 'src.zip');
  zip.writeZip(file);
  return file;
}

/** A complete database directory: the four tables plus src.zip. */
export function createFixtureDb(): string {
  const dir = makeTempDir();
  writeTable(dir, 'FunctionTree.csv', FUNCTION_TREE);
  writeTable(dir, 'Macros.csv', MACROS);
  writeTable(dir, 'GlobalVars.csv', GLOBAL_VARS);
  writeTable(dir, 'Classes.csv', CLASSES);
  writeArchive(dir);
  return dir;
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
