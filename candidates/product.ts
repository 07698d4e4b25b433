import { candidate, contextFile } from "../src/catalog/dsl.js";
import type { CandidateProvider } from "../src/catalog/types.js";

export const uxCopyBank: CandidateProvider = candidate("UX_COPY_BANK.md", "product", {
  description: "UI copy, error messages and microcopy guidelines",
  base: { reusability: 6, timeSaved: 5, leverage: 5 },
  requiredSignals: ["hasWebUi"],
  context: [
    contextFile(/\.(tsx|jsx|vue|svelte)$/, "UI components"),
    contextFile(/(^|\/)(locales?|i18n)\/[^/]+\.json$/, "Translations"),
  ],
  instructions: `Create UX_COPY_BANK.md: the voice and tone, reusable copy for buttons, empty states and errors, and rewrites for unclear strings found in the components.`,
});

export const PRODUCT_CANDIDATES: CandidateProvider[] = [uxCopyBank];
