// Data Specialist: vector and graph stores, query failures, related knowledge
// Tools: search_entities, search_runbooks

import type { Alert } from '../types/alerts.js';
import { BaseSpecialist, type ToolStep } from './base-specialist.js';

const DATA_PROMPT = `You are a data specialist investigating a data store or query alert.

Analyze the provided entities and runbooks to determine:
1. Is the data store healthy?
2. Are queries failing?
3. Is there a sync issue?

Be concise. Focus on the actual issue.`;

const ENTITY_QUERY_CHARS = 100;

export class DataSpecialist extends BaseSpecialist {
  protected readonly systemPrompt = DATA_PROMPT;

  constructor() {
    super('data');
  }

  protected think(alert: Alert): ToolStep[] {
    const context = `${alert.name} ${alert.description}`.trim().slice(0, ENTITY_QUERY_CHARS);
    return [
      { toolName: 'search_entities', params: { query: context }, label: 'Related entities' },
      { toolName: 'search_runbooks', params: { query: alert.name }, label: 'Related runbooks' },
    ];
  }
}
