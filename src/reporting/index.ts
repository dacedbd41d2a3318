export { createConsoleReporter, formatMixedContentReport } from './console.js';
export { createJsonLinesReporter } from './jsonLines.js';
