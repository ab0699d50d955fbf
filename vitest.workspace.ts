import { defineWorkspace } from "vitest/config";

export default defineWorkspace([
  "packages/types",
  "packages/store",
  "packages/coordinator",
  "packages/node",
]);
