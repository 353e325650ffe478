/**
 * zValidator hook: hand validation failures to the global error handler
 * so every 400 has the same body shape.
 */
export function rejectInvalid(result: { success: boolean; error?: unknown }): void {
  if (!result.success) {
    throw result.error;
  }
}
