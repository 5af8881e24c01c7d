/**
 * Parser for backlog markdown documents (milestones, epics and issues)
 */

import fs from 'fs';
import { BacklogItem, Milestone, ParsedBacklog } from './types';

export const EPIC_BODY = 'Epic (see original markdown for details)';

const MILESTONE_PATTERN =
  /## MILESTONE: ([^\n]+)\n\*\*Duration:\*\* ([^\n]+)\n\*\*Goal:\*\* ([\s\S]+?)(?=\n---|\n##|$)/g;

const EPIC_PATTERN = /### EPIC: ([^\n]+)\n\*\*Labels:\*\* ([^\n]+)\n/g;

const ISSUE_PATTERN = new RegExp(
  [
    '### ISSUE #(\\d+): ([^\\n]+)\\n',
    '\\*\\*Labels:\\*\\* ([^\\n]+)\\n',
    '(?:\\*\\*Epic:\\*\\* ([^\\n]+)\\n)?',
    '\\*\\*Milestone:\\*\\* ([^\\n]+)\\n',
    '\\*\\*Estimated Time:\\*\\* ([^\\n]+)\\n+',
    '#### Problem\\n([\\s\\S]+?)\\n+',
    '#### Solution Tasks\\n([\\s\\S]+?)\\n+',
    '#### Acceptance Criteria\\n([\\s\\S]+?)(?=\\n+####|\\n---|\\n###|$)',
  ].join(''),
  'g'
);

/**
 * Split a comma-separated label line, keeping order
 */
export function parseLabels(line: string): string[] {
  return line
    .split(',')
    .map((label) => label.trim())
    .filter((label) => label.length > 0);
}

/**
 * Build the issue body from the structured task sections
 */
export function buildTaskBody(
  estimatedTime: string,
  problem: string,
  solutionTasks: string,
  acceptance: string
): string {
  return [
    `**Estimated Time:** ${estimatedTime}`,
    `## Problem\n${problem}`,
    `## Solution Tasks\n${solutionTasks}`,
    `## Acceptance Criteria\n${acceptance}`,
  ].join('\n\n');
}

export function parseBacklog(markdown: string): ParsedBacklog {
  const content = markdown.replace(/\r\n/g, '\n');

  const milestones: Milestone[] = [];
  for (const match of content.matchAll(MILESTONE_PATTERN)) {
    milestones.push({
      title: match[1].trim(),
      duration: match[2].trim(),
      description: match[3].trim(),
    });
  }

  const epics: BacklogItem[] = [];
  for (const match of content.matchAll(EPIC_PATTERN)) {
    epics.push({
      localNumber: 0,
      title: match[1].trim(),
      body: EPIC_BODY,
      labels: parseLabels(match[2]),
      isEpic: true,
    });
  }

  const tasks: BacklogItem[] = [];
  for (const match of content.matchAll(ISSUE_PATTERN)) {
    const [, number, title, labels, epic, milestone, estimatedTime, problem, solution, acceptance] =
      match;
    const task: BacklogItem = {
      localNumber: parseInt(number, 10),
      title: title.trim(),
      body: buildTaskBody(
        estimatedTime.trim(),
        problem.trim(),
        solution.trim(),
        acceptance.trim()
      ),
      labels: parseLabels(labels),
      milestone: milestone.trim(),
      estimatedTime: estimatedTime.trim(),
      isEpic: false,
    };
    if (epic) {
      task.epic = epic.trim();
    }
    tasks.push(task);
  }

  return { milestones, epics, tasks };
}

/**
 * Read and parse a backlog markdown file
 */
export function readBacklogFile(filePath: string): ParsedBacklog {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Backlog file not found: ${filePath}`);
  }
  return parseBacklog(fs.readFileSync(filePath, 'utf-8'));
}
