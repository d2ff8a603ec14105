// ============================================
// ali Core
// ============================================

/**
 * @module @ali/core
 *
 * Ambient services shared by the engine and the CLI: the error base
 * class, logging, and layered configuration.
 */

export * from "./config/index.js";
export * from "./errors/index.js";
export * from "./logger/index.js";
