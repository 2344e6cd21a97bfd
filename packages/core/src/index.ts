// Errors
export * from "./errors";

// Configuration
export * from "./config";

// Logging
export * from "./logging";

// GitHub client
export * from "./github";

// Docs (GitHub documentation vault)
export * from "./docs";
