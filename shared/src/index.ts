/**
 * @shared/types
 *
 * Shared TypeScript types for the contact API and its clients
 */

// Core types
export * from "./contact.types"

// API types
export * from "./api.types"
export * from "./api/contact.types"

// Runtime schemas (Zod)
export * from "./schemas"
