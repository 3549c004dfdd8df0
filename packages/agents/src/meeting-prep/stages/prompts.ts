/**
 * Stage Prompts
 *
 * Prompt templates for the four pipeline stages. Each template is a pure
 * function of the request and the text gathered so far.
 *
 * @module meeting-prep/stages/prompts
 */

import {
  formatAttendees,
  formatFocusAreas,
} from '../contracts/briefing';
import type { MeetingRequest } from '../contracts/meeting-request';

export const NOT_AVAILABLE = 'Not available';

// ===========================================
// Search Queries
// ===========================================

export function buildContextQuery(request: MeetingRequest, now: Date): string {
  const year = now.getUTCFullYear();
  return `"${request.company_name}" recent news, products and services ${year - 1} ${year}`;
}

export function buildIndustryQuery(request: MeetingRequest): string {
  if (request.industry) {
    return `${request.industry} industry market analysis, trends and competitors`;
  }
  return `Market analysis and trends for the sector of the company '${request.company_name}'`;
}

// ===========================================
// Research Prompts
// ===========================================

export function buildContextPrompt(request: MeetingRequest, searchResults: string): string {
  return `You are a senior business analyst. Your task is to analyze the context for a meeting with the company '${request.company_name}'.

**MEETING DETAILS:**
- Objective: ${request.objective}
- Attendees: ${formatAttendees(request.attendees)}
- Duration: ${request.duration_minutes} minutes

**WEB SEARCH RESULTS:**
${searchResults}

**INSTRUCTIONS:**
Using the data above, write a concise context analysis in Markdown covering:
1. **Company Profile:** sector, size and market position.
2. **Relevant News:** the main recent developments.
3. **Key Products/Services:** what the company offers.
4. **Relevance to the Meeting:** how this context bears on the meeting objective.`;
}

export function buildIndustryPrompt(request: MeetingRequest, searchResults: string): string {
  const subject = request.industry
    ? `the ${request.industry} industry, where the company '${request.company_name}' operates`
    : `the industry of the company '${request.company_name}'`;

  return `As a market analyst, your task is to analyze ${subject}.

**MEETING CONTEXT:**
- Objective: ${request.objective}

**MARKET DATA (WEB SEARCH):**
${searchResults}

**INSTRUCTIONS:**
Provide an industry analysis in Markdown focused on:
1. **Sector Overview:** size, growth and characteristics.
2. **Current Trends:** technological, consumer or regulatory.
3. **Competitive Landscape:** main competitors and how they differ.
4. **Opportunities and Threats:** factors that could affect the meeting.`;
}

// ===========================================
// Synthesis Prompts
// ===========================================

export interface StrategyPromptInput {
  context?: string;
  industry?: string;
}

export function buildStrategyPrompt(request: MeetingRequest, prior: StrategyPromptInput): string {
  return `You are a strategy consultant. Your mission is to build a strategy for the meeting based on the analyses below.

**CONTEXT ANALYSIS:**
${prior.context ?? NOT_AVAILABLE}

**INDUSTRY ANALYSIS:**
${prior.industry ?? NOT_AVAILABLE}

**MEETING PARAMETERS:**
- Duration: ${request.duration_minutes} minutes
- Objective: ${request.objective}
- Attendees: ${formatAttendees(request.attendees)}
- Focus Areas: ${formatFocusAreas(request.focus_areas)}

**INSTRUCTIONS:**
Develop a meeting strategy in Markdown containing:
1. **Detailed Agenda:** topics with allotted time (total: ${request.duration_minutes} min).
2. **Approach Strategy:** key messages to communicate and questions to ask.
3. **Action Plan and Next Steps:** what to do after the meeting.`;
}

export interface BriefingPromptInput extends StrategyPromptInput {
  strategy?: string;
}

export function buildBriefingPrompt(request: MeetingRequest, prior: BriefingPromptInput): string {
  return `As an executive assistant, compile a final briefing for the meeting with '${request.company_name}'.

**COMPILED DATA:**
- Context: ${prior.context ?? NOT_AVAILABLE}
- Industry: ${prior.industry ?? NOT_AVAILABLE}
- Strategy: ${prior.strategy ?? NOT_AVAILABLE}

**INSTRUCTIONS:**
Create a complete, well-structured executive briefing in Markdown. The document must be clear, concise and visually organized. Use emojis to highlight sections. Follow this outline:

# 📋 EXECUTIVE BRIEFING: Meeting with ${request.company_name}

## 🎯 1. MEETING SUMMARY
- **Objective:** ${request.objective}
- **Attendees:** ${formatAttendees(request.attendees)}
- **Duration:** ${request.duration_minutes} minutes
- **Focus Areas:** ${formatFocusAreas(request.focus_areas)}

## 🏢 2. COMPANY CONTEXT

## 📊 3. MARKET ANALYSIS

## 🚀 4. STRATEGY & AGENDA`;
}
