import { createApp } from "./app";

const DEFAULT_PORT = 3001;

function resolvePort(value: string | undefined): number {
  if (!value) return DEFAULT_PORT;
  const port = Number(value);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`resolvePort: PORT must be a valid port number, got "${value}"`);
  }
  return port;
}

const port = resolvePort(process.env.PORT);

createApp().listen(port, () => {
  console.log(`[server] roster extractor listening on http://localhost:${port}`);
});
