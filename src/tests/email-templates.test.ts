import { describe, it, expect } from '@jest/globals';
import { EmailTemplateService, escapeHtml } from '@/services/email-templates.js';

describe('escapeHtml', () => {
  it('escapes markup characters', () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;');
  });
});

describe('EmailTemplateService', () => {
  const service = new EmailTemplateService();

  it('renders the ready email with raw subject and escaped body', async () => {
    const email = await service.render('story-ready', {
      author: 'keeper',
      title: 'Tom & the Seal',
      pageCount: 10,
      hasAudio: true,
      storyUrl: 'https://app.test/stories/abc',
    });

    expect(email.subject).toBe('Your story "Tom & the Seal" is ready');
    expect(email.html).toBe(
      '<p>Hi keeper,</p><p>Your story <strong>Tom &amp; the Seal</strong> has finished generating. ' +
        'It has 10 illustrated pages with narration.</p><p><a href="https://app.test/stories/abc">Read it now</a></p>',
    );
  });

  it('drops the narration clause when there is no audio', async () => {
    const email = await service.render('story-ready', {
      author: 'keeper',
      title: 'Quiet Tide',
      pageCount: 10,
      hasAudio: false,
      storyUrl: 'https://app.test/stories/abc',
    });

    expect(email.html).toContain('It has 10 illustrated pages.</p>');
  });

  it('escapes user input in the failure email', async () => {
    const email = await service.render('story-failed', {
      author: 'keeper',
      prompt: '<script>alert("x")</script>',
      stage: 'generating',
      reason: 'Stage generating timed out after 20ms',
    });

    expect(email.subject).toBe("We couldn't finish your story");
    expect(email.html).toContain('<em>&lt;script&gt;alert(&quot;x&quot;)&lt;/script&gt;</em>');
    expect(email.html).toContain('during the generating step.');
  });
});
