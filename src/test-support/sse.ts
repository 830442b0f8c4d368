/** Client-side reading of a complete SSE body, for asserting on streamed events. */
function parseSseBlock(block: string): { event: string; data: string } | null {
  const lines = block.split("\n").filter(Boolean);
  if (lines.length === 0) return null;

  let event = "message";
  const dataLines: string[] = [];
  for (const line of lines) {
    if (line.startsWith("event:")) {
      event = line.slice("event:".length).trim();
    } else if (line.startsWith("data:")) {
      dataLines.push(line.slice("data:".length).trim());
    }
  }

  if (dataLines.length === 0) return null;
  return { event, data: dataLines.join("\n") };
}

/** Splits a complete SSE body into its events. */
export function parseSseStream(body: string): Array<{ event: string; data: string }> {
  return body
    .split("\n\n")
    .map(parseSseBlock)
    .filter((block): block is { event: string; data: string } => block !== null);
}
