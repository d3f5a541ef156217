import { describe, it, expect } from 'vitest';
import { sanitizeText } from '../../src/domain/sanitize';

describe('sanitizeText', () => {
  it('drops script blocks with their content', () => {
    expect(sanitizeText('<script>alert(1)</script>Hello')).toBe('Hello');
    expect(sanitizeText('<SCRIPT type="text/javascript">x()</SCRIPT >Hi')).toBe('Hi');
  });

  it('strips tags and inline handlers but keeps inner text', () => {
    expect(sanitizeText('<b>Bold</b> text')).toBe('Bold text');
    expect(sanitizeText('<a href="javascript:alert(1)">link</a>')).toBe('link');
    expect(sanitizeText('<img src=x onerror=alert(1)>')).toBe('');
  });

  it('escapes the characters left behind', () => {
    expect(sanitizeText('Tom & Jerry')).toBe('Tom &amp; Jerry');
    expect(sanitizeText("O'Brien")).toBe('O&#x27;Brien');
    expect(sanitizeText('5 > 3')).toBe('5 &gt; 3');
    expect(sanitizeText('say "hi"')).toBe('say &quot;hi&quot;');
  });

  it('trims and truncates', () => {
    expect(sanitizeText('  padded  ')).toBe('padded');
    expect(sanitizeText('abcdef', 3)).toBe('abc');
    expect(sanitizeText('abc', 10)).toBe('abc');
  });

  it('leaves already clean text unchanged', () => {
    const once = sanitizeText('Blue Widget 2000');
    expect(sanitizeText(once)).toBe('Blue Widget 2000');
  });

  it.each([
    "Tom & Jerry's",
    'a < b && c > "d"',
    '&amp; already escaped',
    '<scr<script>x</script>ipt>alert(1)</script>Hi',
    'ononclick==go',
  ])('gives the same text when run twice on %s', (input) => {
    const once = sanitizeText(input);
    expect(sanitizeText(once)).toBe(once);
  });

  it('does not escape its own entities again', () => {
    expect(sanitizeText(sanitizeText("Tom & Jerry's"))).toBe('Tom &amp; Jerry&#x27;s');
    expect(sanitizeText('&amp; &lt; &#x27; &copy;')).toBe('&amp; &lt; &#x27; &amp;copy;');
  });

  it('never truncates through an entity or onto a space', () => {
    expect(sanitizeText('ab <3', 5)).toBe('ab');
    expect(sanitizeText('abc de', 4)).toBe('abc');
    expect(sanitizeText(sanitizeText('ab <3', 5), 5)).toBe('ab');
  });
});
