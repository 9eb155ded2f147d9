import { renderToStaticMarkup } from "react-dom/server";
import App from "./App";
import { renderFigures, type RenderedFigures } from "./components/Charts";
import type { MonteCarloResult } from "./sim/types";

// Just the utility classes the report components use
const REPORT_CSS = `
body { margin: 0; font-family: system-ui, sans-serif; background: #f3f4f6; color: #111827; }
.min-h-screen { min-height: 100vh; }
.p-6 { padding: 1.5rem; } .p-4 { padding: 1rem; } .p-3 { padding: 0.75rem; }
.pr-4 { padding-right: 1rem; }
.max-w-7xl { max-width: 80rem; } .mx-auto { margin-left: auto; margin-right: auto; }
.space-y-4 > * + * { margin-top: 1rem; } .space-y-8 > * + * { margin-top: 2rem; }
.mt-1 { margin-top: 0.25rem; } .mt-2 { margin-top: 0.5rem; } .mt-3 { margin-top: 0.75rem; } .mt-4 { margin-top: 1rem; }
.rounded-xl { border-radius: 0.75rem; } .rounded-lg { border-radius: 0.5rem; }
.border { border: 1px solid #e5e7eb; } .bg-white { background: #ffffff; }
.shadow-sm { box-shadow: 0 1px 2px rgba(0, 0, 0, 0.05); }
.flex { display: flex; } .items-start { align-items: flex-start; } .justify-between { justify-content: space-between; }
.grid { display: grid; } .grid-cols-4 { grid-template-columns: repeat(4, minmax(0, 1fr)); }
.gap-3 { gap: 0.75rem; } .gap-4 { gap: 1rem; }
.text-2xl { font-size: 1.5rem; } .text-lg { font-size: 1.125rem; } .text-base { font-size: 1rem; }
.text-sm { font-size: 0.875rem; } .text-xs { font-size: 0.75rem; }
.text-left { text-align: left; } .text-right { text-align: right; }
.font-bold { font-weight: 700; } .font-semibold { font-weight: 600; }
.opacity-70 { opacity: 0.7; } .opacity-80 { opacity: 0.8; } .text-gray-900 { color: #111827; }
`;

export function renderReportHtml(
  result: MonteCarloResult,
  figures: RenderedFigures = renderFigures(result),
): string {
  const body = renderToStaticMarkup(<App result={result} figures={figures} />);
  return [
    "<!DOCTYPE html>",
    `<html lang="en"><head><meta charset="utf-8" />`,
    `<title>Range Monte-Carlo report</title>`,
    `<style>${REPORT_CSS}</style></head>`,
    `<body>${body}</body></html>`,
    "",
  ].join("\n");
}
