import { describe, it, expect } from 'vitest';
import { deduplicate, normalizeUrl, removeDuplicates, titlePrefix } from '../../src/feeds/dedup';
import { makeArticle } from '../helpers';

describe('normalizeUrl', () => {
  it('should lower-case and strip surrounding slashes', () => {
    expect(normalizeUrl('HTTPS://Example.com/Post/')).toBe('https://example.com/post');
    expect(normalizeUrl('/relative/path//')).toBe('relative/path');
  });
});

describe('titlePrefix', () => {
  it('should take the first 50 characters of the trimmed lower-case title', () => {
    expect(titlePrefix(`  ${'A'.repeat(60)}  `)).toBe('a'.repeat(50));
  });
});

describe('removeDuplicates', () => {
  it('should drop articles whose normalized URL was already seen', () => {
    const articles = [
      makeArticle({ title: 'Open-weights model tops the leaderboard', url: 'https://example.com/a/' }),
      makeArticle({ title: 'A completely different headline here', url: 'HTTPS://EXAMPLE.COM/a' }),
    ];

    const unique = removeDuplicates(articles);

    expect(unique).toHaveLength(1);
    expect(unique[0]).toBe(articles[0]);
  });

  it('should drop articles sharing a title prefix longer than 20 characters', () => {
    const articles = [
      makeArticle({ title: 'GPT-5 launches today!', url: 'https://example.com/1' }),
      makeArticle({ title: 'gpt-5 launches today!', url: 'https://example.com/2' }),
    ];

    expect(removeDuplicates(articles)).toHaveLength(1);
  });

  it('should keep articles sharing a title of 20 characters or fewer', () => {
    const articles = [
      makeArticle({ title: 'GPT-5 launches today', url: 'https://example.com/1' }),
      makeArticle({ title: 'GPT-5 launches today', url: 'https://example.com/2' }),
    ];

    expect(removeDuplicates(articles)).toHaveLength(2);
  });

  it('should compare only the first 50 characters of titles', () => {
    const prefix = 'Researchers unveil a sparse mixture-of-experts mod';
    const articles = [
      makeArticle({ title: `${prefix}el for robotics`, url: 'https://example.com/1' }),
      makeArticle({ title: `${prefix}el for speech`, url: 'https://example.com/2' }),
    ];

    expect(prefix).toHaveLength(50);
    expect(removeDuplicates(articles)).toHaveLength(1);
  });

  it('should ignore case and surrounding whitespace in titles', () => {
    const articles = [
      makeArticle({ title: '  Big News About Transformers Today ', url: 'https://example.com/1' }),
      makeArticle({ title: 'big news about transformers today', url: 'https://example.com/2' }),
    ];

    expect(removeDuplicates(articles)).toHaveLength(1);
  });

  it('should keep the first occurrence and preserve order', () => {
    const articles = [
      makeArticle({ title: 'First story about neural networks', url: 'https://example.com/1', sourceId: '1' }),
      makeArticle({ title: 'Second story about neural networks', url: 'https://example.com/2', sourceId: '2' }),
      makeArticle({ title: 'Repost of the first story', url: 'https://example.com/1/', sourceId: '3' }),
      makeArticle({ title: 'Third story about neural networks', url: 'https://example.com/3', sourceId: '4' }),
    ];

    expect(removeDuplicates(articles).map((a) => a.sourceId)).toEqual(['1', '2', '4']);
  });

  it('should be idempotent', () => {
    const articles = [
      makeArticle({ title: 'Story one about computer vision', url: 'https://example.com/1' }),
      makeArticle({ title: 'Story one about computer vision', url: 'https://example.com/2' }),
      makeArticle({ title: 'Story two about computer vision', url: 'https://example.com/1' }),
      makeArticle({ title: 'Story three about computer vision', url: 'https://example.com/3' }),
    ];

    const once = removeDuplicates(articles);
    expect(removeDuplicates(once)).toEqual(once);
  });
});

describe('deduplicate', () => {
  it('should count removed articles', () => {
    const articles = [
      makeArticle({ title: 'Story one about computer vision', url: 'https://example.com/1' }),
      makeArticle({ title: 'Story two about computer vision', url: 'https://example.com/1' }),
      makeArticle({ title: 'Story three about computer vision', url: 'https://example.com/3' }),
    ];

    const result = deduplicate(articles);

    expect(result.articles).toHaveLength(2);
    expect(result.duplicateCount).toBe(1);
  });

  it('should handle an empty list', () => {
    expect(deduplicate([])).toEqual({ articles: [], duplicateCount: 0 });
  });
});
