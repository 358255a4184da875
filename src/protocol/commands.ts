export type HelperCommand =
  | { type: 'capabilities' }
  | { type: 'list'; forPush: boolean }
  | { type: 'option'; name: string; value: string }
  | { type: 'import'; ref: string }
  | { type: 'export' }
  | { type: 'blank' }
  | { type: 'unknown'; line: string };

export function parseCommand(raw: string): HelperCommand {
  const line = raw.replace(/\r$/, '');
  if (line === '') return { type: 'blank' };
  if (line === 'capabilities') return { type: 'capabilities' };
  if (line === 'list') return { type: 'list', forPush: false };
  if (line === 'list for-push') return { type: 'list', forPush: true };
  if (line === 'export') return { type: 'export' };

  if (line.startsWith('import ')) {
    return { type: 'import', ref: line.slice('import '.length).trim() };
  }
  if (line.startsWith('option ')) {
    const rest = line.slice('option '.length);
    const space = rest.indexOf(' ');
    return space < 0
      ? { type: 'option', name: rest, value: '' }
      : { type: 'option', name: rest.slice(0, space), value: rest.slice(space + 1) };
  }
  return { type: 'unknown', line };
}

/**
 * Quote a status message for `error <ref> <message>`. git recognizes a few
 * bare messages, such as "fetch first", and unquotes everything else.
 */
export function quoteStatusMessage(message: string): string {
  if (/^[a-z -]+$/.test(message)) return message;
  const escaped = message
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\t/g, '\\t');
  return `"${escaped}"`;
}
