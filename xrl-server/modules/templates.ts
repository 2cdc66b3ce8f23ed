/**
 * HTML pages served by the app: the endpoint overview at `/` and the XRL
 * emulator page produced by `/xrl`.
 */

import escapeHtml from "escape-html";
import type { XrlDocument } from "./xrl-document.js";

/** [link, route, description] */
export type EndpointRow = [string, string, string];

/** [label, link, xrl link] */
export type SiteRow = [string, string, string];

export interface IndexPageData {
  baseUrl: string;
  endpoints: EndpointRow[];
  exampleSites: SiteRow[];
  customSites: SiteRow[];
}

function link(href: string, label: string = href): string {
  return `<a href="/${escapeHtml(href)}">${escapeHtml(label)}</a>`;
}

function table(headings: string[], rows: string[][]): string {
  const head = headings.map((h) => `<th>${escapeHtml(h)}</th>`).join("");
  const body = rows
    .map((cells) => `<tr>${cells.map((c) => `<td>${c}</td>`).join("")}</tr>`)
    .join("\n");
  return `<table>\n<thead><tr>${head}</tr></thead>\n<tbody>\n${body}\n</tbody>\n</table>`;
}

export function renderIndexPage(data: IndexPageData): string {
  const endpoints = table(
    ["Example", "Route", "Description"],
    data.endpoints.map(([href, route, description]) => [
      link(href, `/${href}`),
      `<code>${escapeHtml(route)}</code>`,
      escapeHtml(description),
    ])
  );

  const sites = (rows: SiteRow[]) =>
    table(
      ["Site", "Link", "XRL"],
      rows.map(([label, href, xrlHref]) => [
        escapeHtml(label),
        link(href),
        link(xrlHref, "XRL view"),
      ])
    );

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>XRL Demo Server</title>
<link rel="stylesheet" href="/style.css">
</head>
<body>
<h1>XRL Demo Server</h1>
<p>Serving from <code>${escapeHtml(data.baseUrl)}</code></p>
<h2>Endpoints</h2>
${endpoints}
<h2>Example sites</h2>
${sites(data.exampleSites)}
<h2>Custom sites</h2>
${sites(data.customSites)}
</body>
</html>
`;
}

const EMULATOR_CSS = `
html, body { margin: 0; padding: 0; }
.XRL-container {
  display: grid;
  grid-template-columns: minmax(0, 1fr) minmax(0, 3fr) minmax(0, 1fr);
  grid-template-areas: "head head head" "left main right" "below below below" "footer footer footer";
  gap: 16px;
  max-width: 1200px;
  margin: 0 auto;
  padding: 16px;
}
.XRL-region { display: flex; flex-direction: column; gap: 16px; min-width: 0; }
.XRL-region-head { grid-area: head; }
.XRL-region-left { grid-area: left; }
.XRL-region-main { grid-area: main; }
.XRL-region-right { grid-area: right; }
.XRL-region-below { grid-area: below; }
.XRL-region-footer { grid-area: footer; }
`;

function region(name: string, items: string[]): string {
  return `<div class="XRL-region XRL-region-${name}">\n${items.join("\n")}\n</div>`;
}

/**
 * Lay out an XRL document in the emulator grid. Section markup is inserted
 * as-is; it comes from the page being viewed.
 */
export function renderXrlEmulator(doc: XrlDocument): string {
  return `<!DOCTYPE html>
<html>
<head>
<meta charset="utf-8">
<title>${escapeHtml(doc.title)}</title>
${doc.headList.join("\n")}
${doc.styleList.join("\n")}
<style>${EMULATOR_CSS}</style>
</head>
<body>
<div class="XRL-container">
${region("head", doc.head)}
${region("left", doc.left)}
${region("main", doc.main)}
${region("right", doc.right)}
${region("below", doc.below)}
${region("footer", doc.footerList)}
</div>
${doc.scriptList.join("\n")}
</body>
</html>
`;
}
