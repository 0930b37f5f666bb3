import { escapeHtml, fillTemplate, humanize, renderBasicReport, renderFindingCard } from './render';
import type { ReportFinding } from './types';

const card: ReportFinding = {
  id: 'vuln_1',
  type: 'event_handler_xss',
  subtype: 'critical_handler',
  url: 'https://example.com/',
  severity: 'high',
  title: 'Event handler onclick contains dangerous code: <b>',
  description: 'on <button#go>',
  recommendation: 'Bind handlers from script.',
  screenshot: '/tmp/out/screenshots/example-com-12345678.png',
  evidence: { code: '"x" & y' },
};

describe('escapeHtml', () => {
  it('escapes the five HTML-sensitive characters', () => {
    expect(escapeHtml(`<a href="x" title='y'>&</a>`)).toBe(
      '&lt;a href=&quot;x&quot; title=&#39;y&#39;&gt;&amp;&lt;/a&gt;'
    );
  });
});

describe('humanize', () => {
  it('turns identifiers into titles', () => {
    expect(humanize('event_handler_xss')).toBe('Event Handler Xss');
    expect(humanize('url_xss')).toBe('Url Xss');
  });
});

describe('fillTemplate', () => {
  it('replaces every occurrence of each placeholder', () => {
    expect(fillTemplate('{{a}} and {{a}} but {{b}}', { a: '1', b: '2' })).toBe('1 and 1 but 2');
  });

  it('inserts values verbatim, including replacement patterns', () => {
    expect(fillTemplate('{{a}}', { a: '$& $1' })).toBe('$& $1');
  });

  it('does not expand placeholders found inside inserted values', () => {
    expect(fillTemplate('<title>{{target}}</title>{{body}}', { target: '/?q={{body}}', body: 'B' })).toBe(
      '<title>/?q={{body}}</title>B'
    );
  });

  it('leaves unknown placeholders alone', () => {
    expect(fillTemplate('{{a}} {{missing}} {{constructor}}', { a: '1' })).toBe('1 {{missing}} {{constructor}}');
  });
});

describe('renderFindingCard', () => {
  const html = renderFindingCard(card, '/tmp/out/report.html');

  it('escapes page-derived values', () => {
    expect(html).toContain('Event handler onclick contains dangerous code: &lt;b&gt;');
    expect(html).toContain('<p>on &lt;button#go&gt;</p>');
    expect(html).toContain('&quot;code&quot;: &quot;\\&quot;x\\&quot; &amp; y&quot;');
  });

  it('links the screenshot relative to the report', () => {
    expect(html).toContain(
      '<a href="screenshots/example-com-12345678.png" target="_blank"><img src="screenshots/example-com-12345678.png" class="screenshot-thumbnail" alt="Screenshot of the page"></a>'
    );
  });

  it('labels severity, type and subtype', () => {
    expect(html).toContain('<div class="vulnerability-card high" id="vuln_1">');
    expect(html).toContain('<span class="badge">Event Handler Xss</span>');
    expect(html).toContain('<span class="badge">Critical Handler</span>');
  });

  it('omits the screenshot when there is none', () => {
    expect(renderFindingCard({ ...card, screenshot: null }, '/tmp/out/report.html')).not.toContain('<img');
  });
});

describe('renderBasicReport', () => {
  it('lists type, severity and description', () => {
    const html = renderBasicReport([card], '2024-01-02 03:04:05');

    expect(html).toContain('<title>Basic XSS Report</title>');
    expect(html).toContain('<p>Total: 1</p>');
    expect(html).toContain('<h3>event_handler_xss - high</h3>');
    expect(html).toContain('<p>on &lt;button#go&gt;</p>');
  });
});
