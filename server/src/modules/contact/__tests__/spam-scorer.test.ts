import type { SpamAnalysis, SpamSignalName } from '@shared/types'
import { describe, expect, it } from 'vitest'
import { SPAM_KEYWORDS, SpamScorer, isSpamScore } from '../spam-scorer'

const CLEAN_MESSAGE =
  'Hello Jane here. I enjoyed reading your recent article about building small web services with careful testing. ' +
  'Would you be open to a short call next week to talk about a possible collaboration on an open source project? ' +
  'I think our goals overlap quite a bit and it could be fun. Thanks for your time and have a lovely day.'

const scorer = new SpamScorer()

const analyze = (message: string, overrides: { name?: string; email?: string; subject?: string } = {}) =>
  scorer.analyze({
    name: overrides.name ?? 'Jane Doe',
    email: overrides.email ?? 'jane.doe@example.com',
    subject: overrides.subject,
    message
  })

const signalOf = (analysis: SpamAnalysis, name: SpamSignalName) => analysis.signals.find((entry) => entry.name === name)

describe('SpamScorer', () => {
  it('loads the keyword list lowercased', () => {
    expect(SPAM_KEYWORDS).toContain('bitcoin')
    expect(SPAM_KEYWORDS).toContain('visit our website')
    expect(SPAM_KEYWORDS.every((keyword) => keyword === keyword.toLowerCase())).toBe(true)
  })

  it('scores an ordinary message at zero', () => {
    const analysis = analyze(CLEAN_MESSAGE)
    expect(analysis.score).toBe(0)
    expect(analysis.signals.filter((entry) => entry.triggered)).toEqual([])
  })

  it('caps the keyword contribution at 0.4', () => {
    const keywords = signalOf(analyze('Earn money with bitcoin trading, forex and casino tips'), 'spam_keywords')
    expect(keywords).toEqual({ name: 'spam_keywords', triggered: true, contribution: 0.4, measure: 5 })
  })

  it('adds 0.1 for a single keyword', () => {
    const analysis = analyze('I would like a discount on your course please')
    expect(signalOf(analysis, 'spam_keywords')?.contribution).toBeCloseTo(0.1)
    expect(analysis.score).toBeCloseTo(0.1)
  })

  it('counts structural patterns on the original-case text', () => {
    const links = signalOf(analyze('Visit https://a.example and https://b.example now'), 'spam_patterns')
    // two links, each also containing "://"
    expect(links?.measure).toBe(4)
    expect(links?.contribution).toBeCloseTo(0.2)

    const shouting = signalOf(analyze('Please READ THIS when you have a moment'), 'spam_patterns')
    expect(shouting?.measure).toBe(2)
  })

  it('penalises messages under 10 characters', () => {
    expect(signalOf(analyze('Hey there'), 'very_short_message')).toMatchObject({ triggered: true, contribution: 0.2, measure: 9 })
    expect(signalOf(analyze('Hey theres'), 'very_short_message')).toMatchObject({ triggered: false, measure: 10 })
  })

  it('penalises messages over 2000 characters', () => {
    const exactly2000 = 'abcd '.repeat(399) + 'abcde'
    const over2000 = 'abcd '.repeat(400) + 'a'
    expect(exactly2000).toHaveLength(2000)
    expect(over2000).toHaveLength(2001)

    expect(signalOf(analyze(exactly2000), 'very_long_message')?.triggered).toBe(false)
    expect(signalOf(analyze(over2000), 'very_long_message')).toMatchObject({ triggered: true, contribution: 0.15 })
  })

  it('flags numeric emails, repeated characters and unspaced messages', () => {
    expect(signalOf(analyze(CLEAN_MESSAGE, { email: 'user12345@example.com' }), 'numeric_email')?.contribution).toBe(0.1)
    expect(signalOf(analyze('Sooooo good to hear from you'), 'repeated_chars')?.contribution).toBe(0.1)
    expect(signalOf(analyze('Hellothereeveryone'), 'no_spaces')?.contribution).toBe(0.2)
  })

  it('scales excessive punctuation by half the ratio', () => {
    // 3 marks over 12 characters
    const punctuation = signalOf(analyze('Hi, you? Ok.'), 'excessive_punctuation')
    expect(punctuation?.measure).toBeCloseTo(0.25)
    expect(punctuation?.contribution).toBeCloseTo(0.125)
  })

  it('clamps the total to 1', () => {
    const message =
      'CLICK HERE!!! Cheap viagra, bitcoin, casino, forex, loan $500 https://spam.example call 12345678901 nowwwww' +
      ' filler'.repeat(300)
    const analysis = analyze(message, { name: 'WIN BIG', email: 'winner99999@example.com' })
    const rawTotal = analysis.signals.reduce((sum, entry) => sum + entry.contribution, 0)

    expect(rawTotal).toBeGreaterThan(1)
    expect(analysis.score).toBe(1)
  })

  it('never lowers the score when a signal is added', () => {
    const base = analyze(CLEAN_MESSAGE).score
    const withKeyword = analyze(`${CLEAN_MESSAGE} Also, bitcoin.`).score
    const withEverything = analyze(`${CLEAN_MESSAGE} Also, bitcoin!!! Sooooo`, { email: 'jane12345@example.com' }).score

    expect(withKeyword).toBeGreaterThan(base)
    expect(withEverything).toBeGreaterThanOrEqual(withKeyword)
  })

  it('accepts a custom keyword list', () => {
    const custom = new SpamScorer(['Widget'])
    expect(custom.score('Jane Doe', 'jane.doe@example.com', null, 'cheap widget offer for you')).toBeCloseTo(0.1)
  })
})

describe('isSpamScore', () => {
  it('flags scores strictly above the threshold', () => {
    expect(isSpamScore(0.7)).toBe(false)
    expect(isSpamScore(0.71)).toBe(true)
    expect(isSpamScore(0.5, 0.4)).toBe(true)
  })
})
