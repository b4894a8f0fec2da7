export * from "./contact.schema"
