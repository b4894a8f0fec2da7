import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import type { SpamAnalysis, SpamSignal } from '@shared/types'

const moduleDir = path.dirname(fileURLToPath(import.meta.url))

export const SPAM_KEYWORDS: readonly string[] = z
  .array(z.string().min(1))
  .parse(JSON.parse(fs.readFileSync(path.join(moduleDir, 'spam-keywords.json'), 'utf8')))
  .map((keyword) => keyword.toLowerCase())

// Structural patterns, matched against the combined text in its original case.
export const SPAM_PATTERNS: readonly RegExp[] = [
  /https?:\/\/\S+/g, // links
  /\b[A-Z]{3,}\b/g, // shouting
  /!{2,}/g,
  /\$\d+/g,
  /\b\d{10,}\b/g, // phone numbers, account numbers
  /[^\w\s]{3,}/g
]

const PUNCTUATION = /[!@#$%^&*(),.?":{}|<>]/g

export const SPAM_WEIGHTS = {
  keywordPerMatch: 0.1,
  keywordCap: 0.4,
  patternPerMatch: 0.05,
  patternCap: 0.3,
  shortMessage: 0.2,
  longMessage: 0.15,
  numericEmail: 0.1,
  repeatedChars: 0.1,
  noSpaces: 0.2,
  punctuationFactor: 0.5,
  punctuationCap: 0.2
} as const

export const SHORT_MESSAGE_LENGTH = 10
export const LONG_MESSAGE_LENGTH = 2000
export const PUNCTUATION_RATIO_LIMIT = 0.1
export const DEFAULT_SPAM_THRESHOLD = 0.7

export interface SpamScoreInput {
  name: string
  email: string
  subject?: string | null
  message: string
}

function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0
}

function signal(name: SpamSignal['name'], contribution: number, measure?: number): SpamSignal {
  return {
    name,
    triggered: contribution > 0,
    contribution,
    ...(measure !== undefined ? { measure } : {})
  }
}

export function isSpamScore(score: number, threshold: number = DEFAULT_SPAM_THRESHOLD): boolean {
  return score > threshold
}

/**
 * Heuristic spam estimate in [0, 1].
 *
 * Every signal contributes a non-negative amount with its own cap, so no single
 * pattern can saturate the score and adding a signal never lowers it.
 */
export class SpamScorer {
  private readonly keywords: readonly string[]

  constructor(keywords: readonly string[] = SPAM_KEYWORDS) {
    this.keywords = keywords.map((keyword) => keyword.toLowerCase())
  }

  analyze(input: SpamScoreInput): SpamAnalysis {
    const { name, email, message } = input
    const combined = `${name} ${email} ${input.subject ?? ''} ${message}`
    const lowered = combined.toLowerCase()
    const trimmedMessage = message.trim()

    const keywordMatches = this.keywords.filter((keyword) => lowered.includes(keyword)).length
    const patternMatches = SPAM_PATTERNS.reduce((total, pattern) => total + countMatches(combined, pattern), 0)
    const punctuationRatio = countMatches(message, PUNCTUATION) / Math.max(message.length, 1)

    const signals: SpamSignal[] = [
      signal(
        'spam_keywords',
        Math.min(keywordMatches * SPAM_WEIGHTS.keywordPerMatch, SPAM_WEIGHTS.keywordCap),
        keywordMatches
      ),
      signal(
        'spam_patterns',
        Math.min(patternMatches * SPAM_WEIGHTS.patternPerMatch, SPAM_WEIGHTS.patternCap),
        patternMatches
      ),
      signal(
        'very_short_message',
        trimmedMessage.length < SHORT_MESSAGE_LENGTH ? SPAM_WEIGHTS.shortMessage : 0,
        trimmedMessage.length
      ),
      signal(
        'very_long_message',
        trimmedMessage.length > LONG_MESSAGE_LENGTH ? SPAM_WEIGHTS.longMessage : 0,
        trimmedMessage.length
      ),
      signal('numeric_email', /\d{5,}/.test(email) ? SPAM_WEIGHTS.numericEmail : 0),
      signal('repeated_chars', /(.)\1{4,}/.test(lowered) ? SPAM_WEIGHTS.repeatedChars : 0),
      signal('no_spaces', trimmedMessage.includes(' ') ? 0 : SPAM_WEIGHTS.noSpaces),
      signal(
        'excessive_punctuation',
        punctuationRatio > PUNCTUATION_RATIO_LIMIT
          ? Math.min(punctuationRatio * SPAM_WEIGHTS.punctuationFactor, SPAM_WEIGHTS.punctuationCap)
          : 0,
        punctuationRatio
      )
    ]

    const total = signals.reduce((sum, entry) => sum + entry.contribution, 0)
    return { score: Math.min(total, 1), signals }
  }

  score(name: string, email: string, subject: string | null | undefined, message: string): number {
    return this.analyze({ name, email, subject, message }).score
  }
}
