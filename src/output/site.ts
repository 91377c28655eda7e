import { mkdir, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";
import * as core from "@actions/core";
import type { HubConfig } from "../config.js";
import { PersistenceError, describeError } from "../errors.js";
import { PRIORITIES, ISSUE_TYPES } from "../sources/types.js";
import type { IssueRecord, Snapshot } from "./schema.js";
import { readSnapshot, serialize } from "./snapshot.js";

export interface SiteOptions {
  title: string;
  description: string;
  maxIssues: number;
}

const TOP_REPOS = 15;

const PRIORITY_RANK: Record<IssueRecord["priority"], number> = {
  critical: 0,
  high: 1,
  normal: 2,
  low: 3,
};

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/** Priority first, then the source's registry weight, then most recently updated. */
export function orderIssues(
  issues: IssueRecord[],
  weights: Map<string, number>
): IssueRecord[] {
  return [...issues].sort(
    (a, b) =>
      PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority] ||
      (weights.get(b.repo) ?? 1) - (weights.get(a.repo) ?? 1) ||
      Date.parse(b.updated_at) - Date.parse(a.updated_at) ||
      a.id - b.id
  );
}

function renderCategoryCards(snapshot: Snapshot): string {
  return snapshot.sources.categories
    .map((category) => {
      const stats = snapshot.stats.by_category[category.key];
      return `    <div class="card" data-category="${escapeHtml(category.key)}">
      <h3>${escapeHtml(`${category.icon} ${category.label}`.trim())}</h3>
      <p>${stats?.total_issues ?? 0} issues · ${stats?.new_issues ?? 0} new · ${stats?.friendly_issues ?? 0} friendly · ${stats?.total_sources ?? 0} repos</p>
    </div>`;
    })
    .join("\n");
}

/** Bar chart of the sources with the most open issues, scaled to the largest. */
export function renderTopRepos(snapshot: Snapshot): string {
  const names = new Map(
    snapshot.sources.sources.map((s) => [s.repo, s.display_name] as const)
  );
  const top = Object.entries(snapshot.stats.sources)
    .sort(
      ([a, x], [b, y]) =>
        y.open_issues - x.open_issues || (a < b ? -1 : a > b ? 1 : 0)
    )
    .slice(0, TOP_REPOS);
  const largest = Math.max(1, top[0]?.[1].open_issues ?? 0);

  return top
    .map(([repo, stats]) => {
      const width = Math.round((stats.open_issues / largest) * 100);
      return `    <div class="repo-bar-row" title="${escapeHtml(stats.description ?? repo)}">
      <span class="repo-bar-name">${escapeHtml(names.get(repo) ?? repo)}</span>
      <span class="repo-bar-track"><span class="repo-bar-fill" style="width:${width}%"></span></span>
      <span class="repo-bar-count">${stats.open_issues}</span>
    </div>`;
    })
    .join("\n");
}

function renderCounters(snapshot: Snapshot): string {
  const { stats } = snapshot;
  const priorities = PRIORITIES.map(
    (p) => `<span class="badge priority-${p}">${p} ${stats.by_priority[p]}</span>`
  );
  const types = ISSUE_TYPES.map(
    (t) => `<span class="badge type-${t}">${t} ${stats.by_type[t]}</span>`
  );
  return `    <p class="counters">${priorities.join(" ")}</p>
    <p class="counters">${types.join(" ")}</p>`;
}

function renderFilters(snapshot: Snapshot): string {
  const option = (value: string, label: string): string =>
    `<option value="${escapeHtml(value)}">${escapeHtml(label)}</option>`;

  return `    <form class="filters" onsubmit="return false">
      <input id="q" type="search" placeholder="Search issues">
      <select id="category">${option("", "All categories")}${snapshot.sources.categories
        .map((c) => option(c.key, c.label))
        .join("")}</select>
      <select id="priority">${option("", "All priorities")}${PRIORITIES.map((p) => option(p, p)).join("")}</select>
      <select id="type">${option("", "All types")}${ISSUE_TYPES.map((t) => option(t, t)).join("")}</select>
      <label><input id="friendly" type="checkbox"> Contributor-friendly only</label>
    </form>`;
}

export function renderIssue(issue: IssueRecord): string {
  const search = [issue.title, issue.repo, ...issue.labels].join(" ").toLowerCase();
  const labels = issue.labels
    .map((label) => `<span class="label">${escapeHtml(label)}</span>`)
    .join("");
  const flags = [
    issue.is_new ? `<span class="badge new">new</span>` : "",
    issue.friendly ? `<span class="badge friendly">friendly</span>` : "",
  ].join("");

  return `      <li class="issue" data-category="${escapeHtml(issue.category)}" data-priority="${issue.priority}" data-type="${issue.type}" data-friendly="${issue.friendly}" data-search="${escapeHtml(search)}">
        <a href="${escapeHtml(issue.url)}">${escapeHtml(issue.title)}</a>
        <span class="repo">${escapeHtml(issue.repo)}#${issue.number}</span>
        <span class="badge priority-${issue.priority}">${issue.priority}</span><span class="badge type-${issue.type}">${issue.type}</span>${flags}
        <span class="labels">${labels}</span>
        <span class="meta">${escapeHtml(issue.author)} · ${issue.comments} comments · updated ${escapeHtml(issue.updated_at.slice(0, 10))}</span>
      </li>`;
}

const FILTER_SCRIPT = `
    const controls = ["q", "category", "priority", "type", "friendly"].map((id) => document.getElementById(id));
    function apply() {
      const [q, category, priority, type, friendly] = controls;
      const needle = q.value.trim().toLowerCase();
      for (const item of document.querySelectorAll("li.issue")) {
        const d = item.dataset;
        item.hidden =
          (needle && !d.search.includes(needle)) ||
          (category.value && d.category !== category.value) ||
          (priority.value && d.priority !== priority.value) ||
          (type.value && d.type !== type.value) ||
          (friendly.checked && d.friendly !== "true");
      }
    }
    for (const control of controls) control.addEventListener("input", apply);`;

const STYLE = `
    body { font-family: system-ui, sans-serif; max-width: 72rem; margin: 0 auto; padding: 1rem; }
    .cards { display: grid; grid-template-columns: repeat(auto-fill, minmax(14rem, 1fr)); gap: .75rem; }
    .card { border: 1px solid #ddd; border-radius: .5rem; padding: .5rem .75rem; }
    .issues { list-style: none; padding: 0; }
    .issue { border-bottom: 1px solid #eee; padding: .5rem 0; }
    .badge, .label { font-size: .75rem; border-radius: .75rem; padding: 0 .5rem; margin-right: .25rem; background: #eee; }
    .priority-critical { background: #f8d7da; } .priority-high { background: #ffe5b4; }
    .friendly, .new { background: #d4edda; }
    .repo, .meta { color: #666; font-size: .85rem; margin-left: .5rem; }
    .repo-bar-row { display: flex; align-items: center; gap: .75rem; margin: .25rem 0; }
    .repo-bar-name { width: 12rem; text-align: right; font-size: .85rem; }
    .repo-bar-track { flex: 1; height: 1rem; background: #f3f3f3; border-radius: .25rem; }
    .repo-bar-fill { display: block; height: 100%; background: #6f42c1; border-radius: .25rem; }
    .repo-bar-count { width: 3rem; font-size: .85rem; }`;

export function renderSite(snapshot: Snapshot | undefined, options: SiteOptions): string {
  const head = `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${escapeHtml(options.title)}</title>
  <style>${STYLE}
  </style>
</head>`;

  if (!snapshot) {
    return `${head}
<body>
  <h1>${escapeHtml(options.title)}</h1>
  <p>No data yet. Run the fetch command first.</p>
</body>
</html>
`;
  }

  const weights = new Map(snapshot.sources.sources.map((s) => [s.repo, s.weight] as const));
  const shown = orderIssues(snapshot.issues, weights).slice(0, options.maxIssues);
  const { stats, run } = snapshot;

  return `${head}
<body>
  <header>
    <h1>${escapeHtml(options.title)}</h1>
    <p>${escapeHtml(options.description)}</p>
    <p class="totals">${stats.total_issues} open issues from ${stats.total_sources} repos · ${stats.total_new_issues} new in the last ${run.lookback_days_new} days · ${stats.total_friendly} contributor-friendly</p>
${renderCounters(snapshot)}
    <p class="updated">Updated ${escapeHtml(run.generated_at)} · ${run.sources_failed} repos failed to fetch · <a href="data/issues.json">issues.json</a></p>
  </header>
  <section class="cards">
${renderCategoryCards(snapshot)}
  </section>
  <section class="top-repos">
    <h2>Top repos by open issues</h2>
${renderTopRepos(snapshot)}
  </section>
  <main>
${renderFilters(snapshot)}
    <p>Showing ${shown.length} of ${snapshot.issues.length} issues</p>
    <ul class="issues">
${shown.map(renderIssue).join("\n")}
    </ul>
  </main>
  <script>${FILTER_SCRIPT}
  </script>
</body>
</html>
`;
}

async function writeFileAtomic(path: string, content: string): Promise<void> {
  const temp = `${path}.tmp-${process.pid}`;
  await writeFile(temp, content, "utf-8");
  await rename(temp, path);
}

export async function buildSite(config: HubConfig): Promise<void> {
  const snapshot = readSnapshot(config.data_dir);
  if (!snapshot) {
    core.warning(`No snapshot in ${config.data_dir}; rendering a placeholder page`);
  }

  const html = renderSite(snapshot, {
    title: config.site.title,
    description: config.site.description,
    maxIssues: config.site.max_issues,
  });

  try {
    await mkdir(join(config.site_dir, "data"), { recursive: true });
    await writeFileAtomic(join(config.site_dir, "index.html"), html);
    await writeFileAtomic(
      join(config.site_dir, "data", "issues.json"),
      serialize(snapshot?.issues ?? [])
    );
  } catch (error) {
    throw new PersistenceError(`Could not write site: ${describeError(error)}`);
  }

  core.info(
    `Built ${join(config.site_dir, "index.html")} (${snapshot?.issues.length ?? 0} issues, ${snapshot?.sources.categories.length ?? 0} categories)`
  );
}
