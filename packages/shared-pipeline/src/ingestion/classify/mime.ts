/**
 * FILE PURPOSE: MIME classification via `file --brief --mime`
 * WHY: Routing goes by content, never by file extension. The tool prints one
 *      `type/subtype; charset=value` line that is parsed here.
 */

import { runTool } from '../../tools/exec.js';
import type { ContentSniffer, MimeClassification } from '../types.js';

/**
 * Parse a `type/subtype[; charset=value]` line.
 * Anything else yields a null charset and a best-effort split on '/'.
 * Returns null for blank output.
 */
export function parseMimeOutput(output: string): MimeClassification | null {
  const line = output.trim().split('\n')[0]?.trim() ?? '';
  if (!line) return null;

  const [typePart = '', ...params] = line.split(';').map((part) => part.trim());
  const slash = typePart.indexOf('/');
  const charsetParam = params.find((param) => param.toLowerCase().startsWith('charset='));
  const charset = charsetParam?.slice('charset='.length).trim();

  return {
    type: slash === -1 ? typePart : typePart.slice(0, slash),
    subtype: slash === -1 ? null : typePart.slice(slash + 1) || null,
    charset: charset || null,
  };
}

export function mimeString(mime: MimeClassification | null): string {
  if (!mime) return 'unknown';
  return mime.subtype ? `${mime.type}/${mime.subtype}` : mime.type;
}

export class FileCommandSniffer implements ContentSniffer {
  private readonly timeoutMs: number;

  constructor(options: { timeoutMs: number }) {
    this.timeoutMs = options.timeoutMs;
  }

  async sniff(path: string): Promise<string> {
    const { stdout } = await runTool('file', ['--brief', '--mime', path], { timeoutMs: this.timeoutMs });
    return stdout;
  }
}
