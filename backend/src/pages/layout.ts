export const PAGE_STYLES = `
    * { margin: 0; padding: 0; box-sizing: border-box; }
    body { max-width: 800px; margin: 2rem auto; padding: 0 1rem; font-family: sans-serif; }
    h1 { text-align: center; margin-bottom: 2rem; font-size: 24px; }
    .nav-link { margin-top: 2rem; text-align: center; }
    .nav-link a { color: #4285f4; text-decoration: none; padding: 0.8rem 1.5rem; border: 1px solid #4285f4; border-radius: 4px; font-size: 16px; }
    .nav-link a:hover { background: #4285f4; color: white; }`;

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}
