import { candidate, contextFile } from "../src/catalog/dsl.js";
import type { CandidateProvider } from "../src/catalog/types.js";

const TEST_FILES = contextFile(/(^|\/)(tests?|__tests__|spec)\/|\.(test|spec)\.[a-z]+$|(^|\/)test_[^/]+\.py$/, "Existing tests");

export const goldenPathTestPlan: CandidateProvider = candidate("GOLDEN_PATH_TEST_PLAN.md", "tests", {
  description: "Test plan for the critical user journeys",
  maxOutputTokens: 8192,
  base: { reusability: 7, timeSaved: 8, leverage: 8 },
  boostedByGaps: ["Limited test coverage", "No test directory"],
  context: [TEST_FILES, contextFile(/^(vitest|jest)\.config\.[a-z]+$|^pytest\.ini$/, "Test configuration")],
  instructions: `Create a GOLDEN_PATH_TEST_PLAN.md: the critical journeys, the preconditions and steps for each, expected results, and which existing tests already cover them.`,
});

export const minimumTests: CandidateProvider = candidate("MINIMUM_TESTS_SUGGESTION.md", "tests", {
  description: "Smallest useful set of tests to add",
  base: { reusability: 6, timeSaved: 7, leverage: 7 },
  boostedByGaps: ["Limited test coverage", "No test framework"],
  context: [TEST_FILES],
  instructions: `Create MINIMUM_TESTS_SUGGESTION.md listing the ten most valuable tests to add, each with the unit under test, the behaviour asserted and why it matters.`,
});

export const TEST_CANDIDATES: CandidateProvider[] = [goldenPathTestPlan, minimumTests];
