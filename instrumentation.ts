// instrumentation.ts
// Runs once when the Next.js server boots. A missing or incomplete
// configuration file stops the server before it serves any request.

export async function register() {
  if (process.env.NEXT_RUNTIME === "nodejs") {
    const { getServices } = await import("./lib/services");
    getServices();
  }
}
