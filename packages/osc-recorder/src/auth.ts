export function assertControlAuth(headerValue: string | undefined, expectedToken: string | undefined): void {
  if (expectedToken === undefined) {
    return;
  }
  const [scheme, token] = (headerValue ?? "").split(" ");
  if (scheme !== "Bearer" || token !== expectedToken) {
    throw new Error("Unauthorized");
  }
}
