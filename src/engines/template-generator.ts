/**
 * Template Generator
 *
 * Renders selected registry templates against a profile context. Task
 * metadata (deliverable, definition of done) is derived from the template id.
 * A template that cannot render is skipped; the batch continues.
 */

import type { DeliverableType, DodItem, ProfileContext, Task, TaskType } from '../types/index.js';
import { ErrorCode, PlannerError, TemplateRenderError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { toTemplateVariables } from './profile-extractor.js';
import { getMilestoneTypes } from './template-registry.js';
import type { TaskTemplate } from './template-registry.js';
import { findMissingVariables, renderTemplate } from './template-renderer.js';
import { QUICK_WIN_MAX_MINUTES, selectMultiple } from './template-selector.js';
import { dod, newTaskId } from './task-builder.js';

export const DEFAULT_TEMPLATES_PER_TYPE = 2;
const AUTO_TASK_MAX_MINUTES = 60;

export interface TemplateGenerationOptions {
  /** Templates selected per milestone type */
  perType?: number;
}

export function deliverableTypeForTemplate(templateId: string): DeliverableType {
  const id = templateId.toLowerCase();
  if (id.includes('research')) return 'spreadsheet';
  if (id.includes('sop') || id.includes('resume')) return 'doc';
  if (id.includes('email') || id.includes('network')) return 'email';
  if (id.includes('linkedin')) return 'link';
  if (id.includes('application')) return 'shortlist';
  return 'note';
}

export function definitionOfDoneForTemplate(templateId: string): DodItem[] {
  const id = templateId.toLowerCase();
  if (id.includes('research')) {
    return dod(['Sources collected and compared', 40], ['Findings recorded in one place', 30], ['Top options marked', 30]);
  }
  if (id.includes('ielts') || id.includes('exam')) {
    return dod(['Session or booking completed', 50], ['Result or confirmation saved', 50]);
  }
  if (id.includes('sop')) {
    return dod(['Draft written', 35], ['Specific examples included', 35], ['Proofread once', 30]);
  }
  if (id.includes('resume')) {
    return dod(['Bullets rewritten with results', 40], ['Formatting consistent', 30], ['PDF exported', 30]);
  }
  if (id.includes('linkedin')) {
    return dod(['Text written', 35], ['Keywords for the target role included', 35], ['Profile updated', 30]);
  }
  if (id.includes('job') || id.includes('application')) {
    return dod(['Materials tailored', 40], ['Submitted', 30], ['Logged in tracker', 30]);
  }
  return dod(['Task completed', 100]);
}

function constraintsFor(context: ProfileContext): Record<string, string> {
  const constraints: Record<string, string> = {};
  if (context.budget) constraints.budget = context.budget;

  if (context.study) {
    constraints.location = context.study.targetRegion;
    constraints.field = context.study.field;
    constraints.degree = context.study.degreeLevel;
  }
  if (context.career) {
    constraints.role = context.career.targetRole;
    constraints.industry = context.career.targetIndustry;
    constraints.experience = context.career.experienceLevel;
  }
  return constraints;
}

/**
 * Render one template into a task. Throws TemplateRenderError when the
 * context lacks a declared or referenced variable.
 */
export function renderTemplateTask(
  template: TaskTemplate,
  context: ProfileContext,
  milestone?: { title: string; index: number }
): Task {
  const scope = toTemplateVariables(context);
  const missing = findMissingVariables(template.variables, scope);
  if (missing.length > 0) {
    throw new TemplateRenderError(template.id, missing);
  }

  const title = renderTemplate(template.title, scope, template.id).replace(/\s+/g, ' ');
  const description = renderTemplate(template.body, scope, template.id);
  const taskType: TaskType = template.timeboxMinutes <= AUTO_TASK_MAX_MINUTES ? 'auto' : 'copilot';

  return {
    id: newTaskId(),
    title,
    description,
    taskType,
    timeboxMinutes: template.timeboxMinutes,
    priority: template.priority,
    deliverableType: deliverableTypeForTemplate(template.id),
    definitionOfDone: definitionOfDoneForTemplate(template.id),
    constraints: constraintsFor(context),
    source: 'template_agent',
    energyLevel: template.energyLevel,
    isQuickWin: template.timeboxMinutes <= QUICK_WIN_MAX_MINUTES,
    templateId: template.id,
    ...(milestone && { milestoneTitle: milestone.title, milestoneIndex: milestone.index }),
  };
}

/**
 * Tasks for every milestone type of the goal's category, in plan order.
 */
export function generateFromTemplates(context: ProfileContext, options: TemplateGenerationOptions = {}): Task[] {
  const perType = options.perType ?? DEFAULT_TEMPLATES_PER_TYPE;
  const tasks: Task[] = [];
  let skipped = 0;

  getMilestoneTypes(context.category).forEach((milestoneType, position) => {
    const milestone = { title: milestoneType.title, index: position + 1 };
    for (const template of selectMultiple(milestoneType.type, context, perType)) {
      try {
        tasks.push(renderTemplateTask(template, context, milestone));
      } catch (error) {
        if (!(error instanceof PlannerError) || error.code !== ErrorCode.TEMPLATE_RENDER_ERROR) throw error;
        skipped++;
        logger.warn('Skipping template', error, { templateId: template.id });
      }
    }
  });

  logger.info('Template generation complete', {
    category: context.category,
    generated: tasks.length,
    skipped,
  });
  return tasks;
}
