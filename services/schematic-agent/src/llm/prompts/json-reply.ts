/**
 * Pull the outermost JSON object out of a model reply (which may wrap it in
 * prose or a code fence). Returns null when there is none or it does not
 * parse.
 */
export function extractJsonObject(reply: string): unknown {
  const start = reply.indexOf('{');
  const end = reply.lastIndexOf('}');
  if (start === -1 || end <= start) return null;

  try {
    return JSON.parse(reply.slice(start, end + 1));
  } catch {
    return null;
  }
}
