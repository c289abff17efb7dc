/**
 * Prompt assembler with token budget enforcement.
 *
 * Replaces {{placeholder}} patterns in a template with section content,
 * then truncates optional sections if the total exceeds the token ceiling.
 */

import { countTokens, truncateToTokens } from './token-counter.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('prompt-composer:assembler')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Required sections are never truncated; optional sections are cut first.
 */
export type SectionPriority = 'required' | 'optional'

export interface PromptSection {
  name: string
  content: string
  priority: SectionPriority
}

export interface AssembleResult {
  prompt: string
  tokenCount: number
  truncated: boolean
}

// ---------------------------------------------------------------------------
// assemblePrompt
// ---------------------------------------------------------------------------

/**
 * Assemble a final prompt from a template and sections.
 *
 * Sections that end up empty leave no blank-line gaps behind.
 *
 * @param template - Prompt template with {{placeholder}} markers
 * @param sections - Named sections with content and priority
 * @param tokenCeiling - Hard token ceiling
 */
export function assemblePrompt(
  template: string,
  sections: PromptSection[],
  tokenCeiling: number,
): AssembleResult {
  const contentMap: Record<string, string> = {}
  for (const section of sections) {
    contentMap[section.name] = section.content
  }

  let prompt = render(template, contentMap)
  let tokenCount = countTokens(prompt)

  if (tokenCount <= tokenCeiling) {
    return { prompt, tokenCount, truncated: false }
  }

  logger.warn({ tokenCount, ceiling: tokenCeiling }, 'Prompt exceeds token ceiling — truncating optional sections')

  let truncated = false
  for (const section of sections.filter((s) => s.priority === 'optional')) {
    if (tokenCount <= tokenCeiling) break

    const overBy = tokenCount - tokenCeiling
    const currentSectionTokens = countTokens(section.content)
    if (currentSectionTokens === 0) continue

    const targetSectionTokens = Math.max(0, currentSectionTokens - overBy)
    contentMap[section.name] =
      targetSectionTokens === 0 ? '' : truncateToTokens(section.content, targetSectionTokens)
    logger.warn({ sectionName: section.name, targetSectionTokens }, 'Section truncated to fit token budget')

    truncated = true
    prompt = render(template, contentMap)
    tokenCount = countTokens(prompt)
  }

  if (tokenCount > tokenCeiling) {
    logger.warn(
      { tokenCount, ceiling: tokenCeiling },
      'Required sections alone exceed token ceiling — returning over-budget prompt',
    )
  }

  return { prompt, tokenCount, truncated }
}

// ---------------------------------------------------------------------------
// render
// ---------------------------------------------------------------------------

/**
 * Replace {{placeholder}} patterns with values from contentMap (missing ones
 * become empty), then collapse runs of blank lines left by empty sections.
 */
function render(template: string, contentMap: Record<string, string>): string {
  return template
    .replace(/\{\{(\w[\w_-]*)\}\}/g, (_match, key: string) => contentMap[key] ?? '')
    .replace(/\n{3,}/g, '\n\n')
    .trim()
}
