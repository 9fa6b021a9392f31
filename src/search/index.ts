// ─── Search Module Exports ───────────────────────────────────────────

export { StubSearchClient, ShodanSearchClient } from "./client.js";
export type { SearchClient, StubSearchResponder, ShodanSearchClientOptions } from "./client.js";
export { normalizeHostRecord } from "./normalizer.js";
