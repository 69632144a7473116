/**
 * HackerNews Tool - top stories, users and search
 */

import { z } from 'zod';
import { Logger, errorMessage } from '../utils';
import { HttpTool } from './http';

const HN_API = 'https://hacker-news.firebaseio.com/v0';
const HN_SEARCH_API = 'https://hn.algolia.com/api/v1/search';

const StoryIdsSchema = z.array(z.number());

const StorySchema = z.object({
  id: z.number(),
  title: z.string().default(''),
  url: z.string().optional(),
  by: z.string().optional(),
  score: z.number().default(0),
  descendants: z.number().optional(),
  time: z.number().optional(),
});

const UserSchema = z.object({
  id: z.string(),
  karma: z.number().default(0),
  about: z.string().optional(),
  created: z.number().optional(),
  submitted: z.array(z.number()).optional(),
});

const SearchResponseSchema = z.object({
  hits: z.array(
    z.object({
      objectID: z.string(),
      title: z.string().nullish(),
      url: z.string().nullish(),
      author: z.string().nullish(),
      points: z.number().nullish(),
      num_comments: z.number().nullish(),
      created_at: z.string().nullish(),
    })
  ),
});

export interface HackerNewsStory {
  id: number;
  title: string;
  url: string;
  hn_url: string;
  by: string | null;
  score: number;
  comments: number;
  published_date: string | null;
}

export interface HackerNewsUser {
  id: string;
  karma: number;
  about: string | null;
  created: string | null;
  total_items_submitted: number;
}

function discussionUrl(id: number | string): string {
  return `https://news.ycombinator.com/item?id=${id}`;
}

export class HackerNewsTool {
  static async getTopStories(numStories = 10): Promise<HackerNewsStory[]> {
    Logger.info('🟠 Fetching top HackerNews stories', { numStories });

    const ids = await HttpTool.fetchJson(`${HN_API}/topstories.json`, StoryIdsSchema, {
      maxRetries: 2,
    });

    const stories = await Promise.all(
      ids.slice(0, numStories).map(async id => {
        try {
          const story = await HttpTool.fetchJson(`${HN_API}/item/${id}.json`, StorySchema, {
            maxRetries: 1,
          });
          return {
            id: story.id,
            title: story.title,
            url: story.url ?? discussionUrl(story.id),
            hn_url: discussionUrl(story.id),
            by: story.by ?? null,
            score: story.score,
            comments: story.descendants ?? 0,
            published_date: story.time ? new Date(story.time * 1000).toISOString() : null,
          };
        } catch (error) {
          Logger.warn('Failed to load HackerNews story', { id, error: errorMessage(error) });
          return null;
        }
      })
    );

    return stories.filter((story): story is HackerNewsStory => story !== null);
  }

  static async getUserDetails(username: string): Promise<HackerNewsUser> {
    const user = await HttpTool.fetchJson(
      `${HN_API}/user/${encodeURIComponent(username)}.json`,
      UserSchema,
      { maxRetries: 1 }
    );
    return {
      id: user.id,
      karma: user.karma,
      about: user.about ?? null,
      created: user.created ? new Date(user.created * 1000).toISOString() : null,
      total_items_submitted: user.submitted?.length ?? 0,
    };
  }

  static async search(query: string, maxResults = 10): Promise<HackerNewsStory[]> {
    const url = `${HN_SEARCH_API}?tags=story&hitsPerPage=${maxResults}&query=${encodeURIComponent(query)}`;
    const response = await HttpTool.fetchJson(url, SearchResponseSchema, { maxRetries: 2 });

    return response.hits.map(hit => ({
      id: Number(hit.objectID),
      title: hit.title ?? '',
      url: hit.url || discussionUrl(hit.objectID),
      hn_url: discussionUrl(hit.objectID),
      by: hit.author ?? null,
      score: hit.points ?? 0,
      comments: hit.num_comments ?? 0,
      published_date: hit.created_at ?? null,
    }));
  }
}
