const HTML_ENTITIES: Record<string, string> = {
  '<': '&lt;',
  '>': '&gt;',
  '&': '&amp;',
  '"': '&quot;',
  "'": '&#x27;'
};

function escapeEntities(input: string): string {
  return input.replace(/[<>&"']/g, (char) => HTML_ENTITIES[char] ?? char);
}

export function sanitizeForLog(input: string): string {
  return escapeEntities(input.replace(/[\r\n\t]/g, ' ')).substring(0, 200);
}

export function sanitizeForOutput(input: string): string {
  return escapeEntities(input);
}
