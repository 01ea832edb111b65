import type { Task } from '../../types/task.js';
import { displayMinute, formatMinute, fromDate } from '../../parsers/timestamp-parser.js';
import type { EncodeOptions } from '../options.js';

const STYLESHEET = `
    body {
      font-family: Arial, sans-serif;
      max-width: 900px;
      margin: 0 auto;
      padding: 20px;
      background-color: #f5f5f5;
    }
    h1 {
      color: #333;
      border-bottom: 3px solid #4caf50;
      padding-bottom: 10px;
    }
    .task {
      background: white;
      padding: 15px;
      margin: 10px 0;
      border-radius: 5px;
      box-shadow: 0 2px 4px rgba(0, 0, 0, 0.1);
    }
    .task.completed {
      opacity: 0.6;
      text-decoration: line-through;
    }
    .priority-high { border-left: 5px solid #f44336; }
    .priority-medium { border-left: 5px solid #ff9800; }
    .priority-low { border-left: 5px solid #4caf50; }
    .badge {
      display: inline-block;
      padding: 3px 8px;
      border-radius: 3px;
      font-size: 12px;
      font-weight: bold;
      color: white;
    }
    .badge-high { background-color: #f44336; }
    .badge-medium { background-color: #ff9800; }
    .badge-low { background-color: #4caf50; }
    .badge-completed { background-color: #2196f3; }
    .date {
      color: #666;
      font-size: 14px;
    }`;

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function taskBlock(task: Task): string[] {
  const classes = `task priority-${task.priority}${task.completed ? ' completed' : ''}`;
  const badges = [`<span class="badge badge-${task.priority}">${task.priority.toUpperCase()}</span>`];
  if (task.completed) badges.push('<span class="badge badge-completed">COMPLETED</span>');

  return [
    `  <div class="${classes}">`,
    `    <div>${badges.join(' ')}</div>`,
    `    <h3>${escapeHtml(task.description)}</h3>`,
    `    <p class="date">Created: ${displayMinute(task.createdAt)}</p>`,
    '  </div>',
  ];
}

/** A standalone HTML page: export header, then one styled block per task in collection order */
export function encodeDocument(tasks: readonly Task[], options: EncodeOptions = {}): string {
  const now = options.now ?? new Date();
  const lines = [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '  <meta charset="UTF-8">',
    '  <meta name="viewport" content="width=device-width, initial-scale=1.0">',
    '  <title>Task List Export</title>',
    `  <style>${STYLESHEET}\n  </style>`,
    '</head>',
    '<body>',
    '  <h1>Task List</h1>',
    `  <p><em>Exported: ${formatMinute(fromDate(now))}</em></p>`,
    `  <p><strong>Total Tasks:</strong> ${tasks.length}</p>`,
  ];

  for (const task of tasks) {
    lines.push(...taskBlock(task));
  }

  lines.push('</body>', '</html>');
  return lines.join('\n') + '\n';
}
