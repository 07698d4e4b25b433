import { candidate, contextFile } from "../src/catalog/dsl.js";
import type { CandidateProvider } from "../src/catalog/types.js";

const HANDLERS = contextFile(/(^|\/)(routes?|api|handlers?|controllers?|endpoints?)\/[^/]+\.(ts|js|py|go|rb|java)$/, "Request handlers");

export const endpointInventory: CandidateProvider = candidate("ENDPOINT_INVENTORY.md", "api", {
  description: "Inventory of API endpoints with request and response shapes",
  base: { reusability: 8, timeSaved: 7, leverage: 7 },
  requiredSignals: ["hasApi"],
  boostedByGaps: ["API exists but lacks documentation"],
  context: [HANDLERS],
  instructions: `Create ENDPOINT_INVENTORY.md: one table row per endpoint with method, path, auth requirement, request body, response and the handler file.`,
});

export const openapiDraft: CandidateProvider = candidate("openapi_draft.json", "api", {
  description: "Draft OpenAPI 3.0 document for the detected endpoints",
  maxOutputTokens: 16384,
  base: { reusability: 9, timeSaved: 8, leverage: 8 },
  requiredSignals: ["hasApi"],
  boostedByGaps: ["API exists but lacks documentation"],
  context: [HANDLERS, contextFile(/(^|\/)(schemas?|models?|dto)\/[^/]+\.(ts|js|py|go)$/, "Data models")],
  instructions: `Produce a draft OpenAPI 3.0 document as JSON only, no prose. Mark anything inferred with "x-inferred": true.`,
});

export const API_CANDIDATES: CandidateProvider[] = [endpointInventory, openapiDraft];
