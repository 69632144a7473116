/**
 * Research Team - a leader agent that delegates to member agents
 * (HackerNews, web search, article reading) and writes a markdown report.
 */

import { z } from 'zod';
import { BaseAgent, type AgentDeps } from './base';
import { defineTool, type AgentTool } from './tools';
import { Logger, errorMessage, truncate } from '../utils';
import { ScraperTool } from '../tools/scraper';
import { TavilyTool } from '../tools/tavily';
import { duckDuckGoTool, hackerNewsTools, tavilySearchTool } from '../tools/search-tools';
import type { ResearchMemberResponse, ResearchReport } from '../types';

export const ARTICLE_TEXT_LIMIT = 8000;

export interface ResearchMember {
  /** Agent name, used for stored messages and cost context */
  name: string;
  /** Name the leader addresses the member by */
  label: string;
  role: string;
  instructions: string[];
  tools: AgentTool[];
}

export function readArticleTool(scraper: ScraperTool = new ScraperTool()): AgentTool {
  return defineTool({
    name: 'read_article',
    description: 'Read the main text of a web page.',
    parameters: {
      type: 'object',
      properties: { url: { type: 'string' } },
      required: ['url'],
    },
    schema: z.object({ url: z.string().url() }),
    execute: async ({ url }) => {
      const result = await scraper.scrapeUrl(url);
      if (!result.success) {
        return `Error reading article: ${result.error}`;
      }
      return `Title: ${result.title}\nURL: ${result.final_url}\n\n${truncate(result.full_text, ARTICLE_TEXT_LIMIT)}`;
    },
  });
}

export function createResearchMembers(scraper?: ScraperTool): ResearchMember[] {
  const webTools = TavilyTool.isConfigured() ? [duckDuckGoTool, tavilySearchTool] : [duckDuckGoTool];

  return [
    {
      name: 'HackerNewsResearcher',
      label: 'HackerNews Researcher',
      role: 'Gets top stories from HackerNews.',
      instructions: ['Use the HackerNews tools to find stories and details about their authors.'],
      tools: hackerNewsTools,
    },
    {
      name: 'WebSearcher',
      label: 'Web Searcher',
      role: 'Searches the web for information on a topic.',
      instructions: ['Search for recent coverage and list the most relevant links with one-line notes.'],
      tools: webTools,
    },
    {
      name: 'ArticleReader',
      label: 'Article Reader',
      role: 'Reads articles from URLs.',
      instructions: ['Read each URL you are given and summarize the key points and facts.'],
      tools: [readArticleTool(scraper)],
    },
  ];
}

export class ResearchMemberAgent extends BaseAgent<{ task: string }, string> {
  constructor(
    readonly member: ResearchMember,
    deps: AgentDeps = {}
  ) {
    super(
      {
        name: member.name,
        systemPrompt: [`Your role: ${member.role}`, ...member.instructions].join('\n'),
        temperature: 0.3,
        retries: 1,
      },
      deps
    );
  }

  protected async process(input: { task: string }, runId: string): Promise<string> {
    const result = await this.runTools(
      [
        { role: 'system', content: this.config.systemPrompt },
        { role: 'user', content: input.task },
      ],
      this.member.tools,
      { sessionId: runId }
    );
    return result.content;
  }
}

const LEADER_INSTRUCTIONS = [
  'You lead a research team and answer the user with a report.',
  'First, search HackerNews for what the user is asking about.',
  'Then, ask the Article Reader to read the links for the stories to get more information.',
  'Important: you must give the Article Reader the links to read.',
  'Then, ask the Web Searcher to search for each story to get more information.',
  'Finally, provide a thoughtful and engaging summary in markdown.',
];

export interface ResearchTeamDeps extends AgentDeps {
  members?: ResearchMemberAgent[];
  scraper?: ScraperTool;
}

export class ResearchTeam extends BaseAgent<{ query: string }, ResearchReport> {
  private members: ResearchMemberAgent[];

  constructor(deps: ResearchTeamDeps = {}) {
    super(
      {
        name: 'ResearchTeam',
        systemPrompt: LEADER_INSTRUCTIONS.join('\n'),
        temperature: 0.4,
        maxTokens: 4000,
        retries: 1,
      },
      deps
    );
    const memberDeps = { client: deps.client, costTracker: deps.costTracker, storage: deps.storage };
    this.members =
      deps.members ??
      createResearchMembers(deps.scraper).map(member => new ResearchMemberAgent(member, memberDeps));
  }

  get memberLabels(): string[] {
    return this.members.map(agent => agent.member.label);
  }

  protected async process(input: { query: string }, runId: string): Promise<ResearchReport> {
    const responses: ResearchMemberResponse[] = [];
    const roster = this.members
      .map(agent => `- ${agent.member.label}: ${agent.member.role}`)
      .join('\n');

    const result = await this.runTools(
      [
        { role: 'system', content: `${this.config.systemPrompt}\n\nTeam members:\n${roster}` },
        { role: 'user', content: input.query },
      ],
      [this.delegateTool(runId, responses)],
      { sessionId: runId }
    );

    Logger.info('📚 Research report ready', {
      runId,
      delegations: responses.length,
      steps: result.steps,
    });

    return {
      query: input.query,
      content: result.content,
      member_responses: responses,
    };
  }

  private delegateTool(runId: string, responses: ResearchMemberResponse[]): AgentTool {
    const labels = this.memberLabels;
    return defineTool({
      name: 'transfer_task_to_member',
      description: 'Give a task to one team member and get their answer back.',
      parameters: {
        type: 'object',
        properties: {
          member_name: { type: 'string', enum: labels },
          task_description: { type: 'string' },
        },
        required: ['member_name', 'task_description'],
      },
      schema: z.object({
        member_name: z.string(),
        task_description: z.string().min(1),
      }),
      execute: async ({ member_name, task_description }) => {
        const agent = this.members.find(candidate => candidate.member.label === member_name);
        if (!agent) {
          return `Error: no team member named ${member_name}. Members: ${labels.join(', ')}`;
        }
        try {
          const response = await agent.run(runId, { task: task_description });
          responses.push({ member: member_name, task: task_description, response });
          return response;
        } catch (error) {
          return `Error: ${member_name} could not complete the task: ${errorMessage(error)}`;
        }
      },
    });
  }
}
