import { inspect } from "node:util";

// pg errors carry the SQLSTATE and constraint beside the message.
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    const details: string[] = [error.stack ?? error.message];
    if ("code" in error && typeof error.code === "string") {
      details.push(`code: ${error.code}`);
    }
    if ("constraint" in error && typeof error.constraint === "string") {
      details.push(`constraint: ${error.constraint}`);
    }
    return details.join("\n");
  }

  return inspect(error, { depth: 4 });
}
