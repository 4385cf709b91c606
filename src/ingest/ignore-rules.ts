/**
 * Gitignore-style path rules.
 *
 * A pattern with a slash anywhere but at its end is matched against the full
 * root-relative path; any other pattern is matched against the last path
 * segment at every depth. `**` spans zero or more whole segments.
 */
export interface IgnoreRule {
  readonly negated: boolean;
  readonly directoryOnly: boolean;
  readonly anchored: boolean;
  readonly regex: RegExp;
}

const REGEX_SPECIAL = /[.*+?^${}()|[\]\\]/g;

export function compileIgnoreRule(line: string): IgnoreRule | null {
  let body = line.trim();
  if (!body || body.startsWith("#")) {
    return null;
  }

  const negated = body.startsWith("!");
  if (negated) {
    body = body.slice(1);
  } else if (body.startsWith("\\")) {
    body = body.slice(1);
  }

  const directoryOnly = body.endsWith("/");
  if (directoryOnly) {
    body = body.replace(/\/+$/, "");
  }
  const anchored = body.includes("/");
  body = body.replace(/^\/+/, "");
  if (!body) {
    return null;
  }

  return { negated, directoryOnly, anchored, regex: globToRegExp(body) };
}

export function parseIgnoreFile(contents: string): IgnoreRule[] {
  const rules: IgnoreRule[] = [];
  for (const line of contents.split(/\r?\n/)) {
    const rule = compileIgnoreRule(line);
    if (rule) {
      rules.push(rule);
    }
  }
  return rules;
}

/** The last matching rule wins, so a later `!pattern` re-includes a path. */
export function isIgnored(
  relativePath: string,
  isDirectory: boolean,
  rules: readonly IgnoreRule[],
): boolean {
  const name = relativePath.slice(relativePath.lastIndexOf("/") + 1);
  let ignored = false;
  for (const rule of rules) {
    if (rule.directoryOnly && !isDirectory) {
      continue;
    }
    if (rule.regex.test(rule.anchored ? relativePath : name)) {
      ignored = !rule.negated;
    }
  }
  return ignored;
}

function globToRegExp(glob: string): RegExp {
  const segments = glob.split("/");
  const parts = segments.map((segment, index) => {
    const isLast = index === segments.length - 1;
    if (segment === "**") {
      return isLast ? ".*" : "(?:[^/]+/)*";
    }
    return translateSegment(segment) + (isLast ? "" : "/");
  });
  return new RegExp(`^${parts.join("")}$`);
}

function translateSegment(segment: string): string {
  let source = "";
  for (let index = 0; index < segment.length; index += 1) {
    const char = segment.charAt(index);
    if (char === "*") {
      source += "[^/]*";
    } else if (char === "?") {
      source += "[^/]";
    } else if (char === "[") {
      const close = segment.indexOf("]", index + 2);
      if (close === -1) {
        source += "\\[";
        continue;
      }
      const members = segment.slice(index + 1, close).replace(/\\/g, "\\\\");
      source += members.startsWith("!") ? `[^${members.slice(1)}]` : `[${members}]`;
      index = close;
    } else {
      source += char.replace(REGEX_SPECIAL, "\\$&");
    }
  }
  return source;
}
