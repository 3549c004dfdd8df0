/**
 * Meeting Briefing Agents
 *
 * @module @meeting-briefing/agents
 */

export * from './meeting-prep';
