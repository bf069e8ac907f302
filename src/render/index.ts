import { renderJson } from './json';
import { renderMarkdown } from './markdown';
import { renderText } from './text';
import type { DecisionResult, OutputFormat } from '../types';

const RENDERERS: Record<OutputFormat, (result: DecisionResult) => string> = {
  text: renderText,
  markdown: renderMarkdown,
  json: renderJson
};

export function render(result: DecisionResult, format: OutputFormat): string {
  return RENDERERS[format](result);
}
