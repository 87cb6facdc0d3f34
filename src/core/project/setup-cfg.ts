/**
 * Minimal reader for setuptools' `setup.cfg`: `[section]` headers, `key = value`
 * (or `key: value`) options and indented continuation lines. Comments start
 * with `#` or `;` at the beginning of a line.
 */
export type SetupCfg = Record<string, Record<string, string>>;

export function parseSetupCfg(text: string): SetupCfg {
  const result: SetupCfg = {};
  let current: Record<string, string> | undefined;
  let lastKey: string | undefined;

  for (const line of text.split(/\r?\n/)) {
    if (/^\s*[#;]/.test(line) || line.trim() === '') {
      // Blank lines inside a multi-line value are kept by configparser but carry no data
      continue;
    }

    const header = /^\[([^\]]+)\]\s*$/.exec(line);
    if (header) {
      const name = header[1].trim();
      current = result[name] ?? (result[name] = {});
      lastKey = undefined;
      continue;
    }

    if (/^\s/.test(line)) {
      if (current && lastKey !== undefined) {
        const previous = current[lastKey];
        current[lastKey] = previous ? `${previous}\n${line.trim()}` : line.trim();
      }
      continue;
    }

    const option = /^([^=:]+?)\s*[=:]\s*(.*)$/.exec(line);
    if (option && current) {
      lastKey = option[1].trim().toLowerCase();
      current[lastKey] = option[2].trim();
    }
  }

  return result;
}
