// Kept in step with packages/cli/package.json
export const version = "0.1.0";
