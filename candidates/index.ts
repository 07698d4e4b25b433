import { CandidateRegistry } from "../src/catalog/registry.js";
import type { CandidateProvider } from "../src/catalog/types.js";
import { API_CANDIDATES } from "./api.js";
import { DOCS_CANDIDATES } from "./docs.js";
import { OBSERVABILITY_CANDIDATES } from "./observability.js";
import { PRODUCT_CANDIDATES } from "./product.js";
import { SECURITY_CANDIDATES } from "./security.js";
import { TEST_CANDIDATES } from "./tests.js";

export const BUILTIN_CANDIDATES: readonly CandidateProvider[] = [
  ...DOCS_CANDIDATES,
  ...SECURITY_CANDIDATES,
  ...TEST_CANDIDATES,
  ...API_CANDIDATES,
  ...OBSERVABILITY_CANDIDATES,
  ...PRODUCT_CANDIDATES,
];

/** A fresh registry holding the built-in catalog; callers may register more */
export function createDefaultRegistry(): CandidateRegistry {
  return new CandidateRegistry(BUILTIN_CANDIDATES);
}
