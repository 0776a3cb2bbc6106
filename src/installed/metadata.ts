export type DistributionMetadata = {
  name: string;
  version: string;
  requiresDist: string[];
};

/** Reads the header block of a METADATA / PKG-INFO file (RFC 822 style). */
export function parseMetadataHeaders(text: string): Map<string, string[]> {
  const headers = new Map<string, string[]>();
  let lastKey: string | undefined;

  for (const line of text.split(/\r?\n/)) {
    if (line.length === 0) {
      break;
    }

    if (/^[ \t]/.test(line) && lastKey) {
      const values = headers.get(lastKey);
      if (values && values.length > 0) {
        values[values.length - 1] = `${values[values.length - 1]} ${line.trim()}`;
      }
      continue;
    }

    const separator = line.indexOf(":");
    if (separator <= 0) {
      continue;
    }

    const key = line.slice(0, separator).trim().toLowerCase();
    const value = line.slice(separator + 1).trim();
    const values = headers.get(key) ?? [];
    values.push(value);
    headers.set(key, values);
    lastKey = key;
  }

  return headers;
}

export function parseDistributionMetadata(text: string): DistributionMetadata | undefined {
  const headers = parseMetadataHeaders(text);
  const name = headers.get("name")?.[0];
  const version = headers.get("version")?.[0];
  if (!name || !version) {
    return undefined;
  }

  return {
    name,
    version,
    requiresDist: headers.get("requires-dist") ?? []
  };
}

/**
 * Converts an egg-info `requires.txt` into Requires-Dist style strings.
 * `[extra]`, `[:marker]` and `[extra:marker]` sections become markers.
 */
export function parseEggRequires(text: string): string[] {
  const requirements: string[] = [];
  let sectionMarker: string | undefined;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith("#")) {
      continue;
    }

    const section = /^\[(.*)\]$/.exec(line);
    if (section) {
      const [extra, condition] = section[1].split(":", 2).map((part) => part.trim());
      const markers: string[] = [];
      if (condition) {
        markers.push(`(${condition})`);
      }
      if (extra) {
        markers.push(`extra == "${extra}"`);
      }
      sectionMarker = markers.length > 0 ? markers.join(" and ") : undefined;
      continue;
    }

    requirements.push(sectionMarker ? `${line}; ${sectionMarker}` : line);
  }

  return requirements;
}
