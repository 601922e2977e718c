/**
 * Rules from a robots.txt that apply to `User-agent: *`.
 */
export interface RobotsRules {
  disallowed: string[];
  allowed: string[];
  crawlDelay: number | null; // seconds
  sitemaps: string[];
}

export const ALLOW_ALL: RobotsRules = { disallowed: [], allowed: [], crawlDelay: null, sitemaps: [] };
export const BLOCK_ALL: RobotsRules = { disallowed: ['/'], allowed: [], crawlDelay: null, sitemaps: [] };

export function parseRobotsTxt(text: string): RobotsRules {
  const rules: RobotsRules = { disallowed: [], allowed: [], crawlDelay: null, sitemaps: [] };
  let groupAgents: string[] = [];
  let groupHasRules = false;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, '').trim();
    if (!line) continue;

    const colonIndex = line.indexOf(':');
    if (colonIndex === -1) continue;

    const directive = line.slice(0, colonIndex).trim().toLowerCase();
    const value = line.slice(colonIndex + 1).trim();

    if (directive === 'sitemap') {
      // Sitemap lines are global, independent of user-agent groups
      if (value) rules.sitemaps.push(value);
      continue;
    }

    if (directive === 'user-agent') {
      if (groupHasRules) {
        groupAgents = [];
        groupHasRules = false;
      }
      groupAgents.push(value.toLowerCase());
      continue;
    }

    groupHasRules = true;
    if (!groupAgents.includes('*')) continue;

    if (directive === 'disallow' && value) {
      rules.disallowed.push(value);
    } else if (directive === 'allow' && value) {
      rules.allowed.push(value);
    } else if (directive === 'crawl-delay') {
      const delay = parseFloat(value);
      if (!isNaN(delay) && delay > 0) rules.crawlDelay = delay;
    }
  }

  return rules;
}

function matchesRule(path: string, rule: string): boolean {
  if (rule.endsWith('$')) {
    return path === rule.slice(0, -1);
  }
  const prefix = rule.endsWith('*') ? rule.slice(0, -1) : rule;
  return path.startsWith(prefix);
}

/**
 * Longest matching rule wins; Allow wins a tie.
 */
export function isUrlAllowed(rules: RobotsRules, url: string): boolean {
  let path: string;
  try {
    const { pathname, search } = new URL(url);
    path = pathname + search;
  } catch {
    return false; // not a URL, never fetch it
  }

  const longest = (candidates: string[]) =>
    candidates.filter((rule) => matchesRule(path, rule)).reduce((max, rule) => Math.max(max, rule.length), -1);

  const disallowLength = longest(rules.disallowed);
  if (disallowLength < 0) return true;
  return longest(rules.allowed) >= disallowLength;
}
