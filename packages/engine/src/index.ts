// ─── @no-mercy/engine ──────────────────────────────────────────────
// Pure TypeScript turn engine. No framework dependencies.
// Re-exports the schema types plus every engine function and class.

export * from "@no-mercy/schema";
export * from "./cards/card";
export * from "./deck/index";
export * from "./engine/index";
export * from "./policies/index";
