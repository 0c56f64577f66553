import { readFileSync } from "fs";
import path from "path";

export function loadFixture(name: string): unknown {
  return JSON.parse(readFileSync(path.join(__dirname, "fixtures", name), "utf8"));
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}
