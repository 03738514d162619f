import { describe, it, expect } from 'vitest';
import { escapeHtml, loadLandingTemplate, renderLandingPage } from '../landing-page.js';

describe('landing page', () => {
    it('escapes HTML special characters', () => {
        expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
            '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;',
        );
    });

    it('fills in every placeholder', () => {
        const html = renderLandingPage('<title>{{APP_NAME}}</title><h1>{{APP_NAME}}</h1><p>{{APP_VERSION}}</p>', {
            name: 'Tasks <beta>',
            version: '1.2.0',
        });
        expect(html).toBe('<title>Tasks &lt;beta&gt;</title><h1>Tasks &lt;beta&gt;</h1><p>1.2.0</p>');
    });

    it('ships a template with both placeholders', () => {
        const template = loadLandingTemplate();
        expect(template).toContain('<title>{{APP_NAME}}</title>');
        expect(template).toContain('Version {{APP_VERSION}}');
    });
});
