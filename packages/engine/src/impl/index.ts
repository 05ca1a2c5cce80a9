/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of engine contracts.
 *
 * @module @scriptorium/engine/impl
 */

export { InMemoryEventBus } from "./InMemoryEventBus.js";
