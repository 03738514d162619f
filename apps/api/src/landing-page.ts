import fs from 'fs';
import { fileURLToPath } from 'url';

const TEMPLATE_URL = new URL('../public/index.html', import.meta.url);

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

export interface LandingPageValues {
    name: string;
    version: string;
}

export function renderLandingPage(template: string, values: LandingPageValues): string {
    return template
        .replaceAll('{{APP_NAME}}', escapeHtml(values.name))
        .replaceAll('{{APP_VERSION}}', escapeHtml(values.version));
}

export function loadLandingTemplate(): string {
    return fs.readFileSync(fileURLToPath(TEMPLATE_URL), 'utf8');
}
