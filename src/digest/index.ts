export { createDigestSender } from "./sender";

export { createJsonFileStore, createMemoryStore } from "./store";

export { runDigestCycle } from "./orchestrator";
