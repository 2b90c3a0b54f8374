import type { BookStat, Participant } from '../../storage/types.js'
import { lastMonthsPeriod, parseMonth, parseYear } from '../dates.js'
import { completed, createReplyBuilder, guardStorage, parseIndex, singleColumn, type DialogDeps } from '../replies.js'
import type { ButtonGrid, ReportPeriod, StatsState, StepResult, ReplySurface } from '../types.js'
import { formatMessage } from '../../messages.js'

export const TOP_BOOKS_LIMIT = 10

const ROLLING_WINDOWS: ReadonlyMap<string, number> = new Map([
  ['last2', 2],
  ['last3', 3],
  ['last6', 6],
  ['last12', 12]
])

type ChoosingPeriod = Extract<StatsState, { step: 1 }>
type ChoosingFilter = Extract<StatsState, { step: 2 }>

export function createStatsReportDialog(deps: DialogDeps) {
  const { storage, messages, logger, clock } = deps
  const reply = createReplyBuilder(messages)

  function periodButtons(): ButtonGrid {
    return [
      [reply.button('stats_period_month', 'stats_period:month'), reply.button('stats_period_year', 'stats_period:year')],
      [reply.button('stats_period_last', 'stats_period:last2', { months: 2 }), reply.button('stats_period_last', 'stats_period:last3', { months: 3 })],
      [reply.button('stats_period_last', 'stats_period:last6', { months: 6 }), reply.button('stats_period_last', 'stats_period:last12', { months: 12 })]
    ]
  }

  function renderReport(period: ReportPeriod, participantName: string, stats: readonly BookStat[]): string {
    const lines = stats.map((stat, i) =>
      formatMessage(messages, 'stats_report_line', { rank: i + 1, book: stat.bookName, count: stat.readCount })
    )
    return [
      formatMessage(messages, 'stats_report_title'),
      formatMessage(messages, 'stats_report_period', { label: period.label, start: period.startDate, end: period.endDate }),
      participantName === ''
        ? formatMessage(messages, 'stats_report_all_children')
        : formatMessage(messages, 'stats_report_participant', { name: participantName }),
      formatMessage(messages, 'stats_report_top', { limit: TOP_BOOKS_LIMIT }),
      lines.join('\n')
    ].join('\n\n')
  }

  async function listChildren(): Promise<Participant[]> {
    const participants = await storage.listParticipants()
    return participants.filter(p => !p.isParent)
  }

  async function begin(surface: ReplySurface): Promise<StepResult> {
    return {
      state: { command: 'stats', step: 1, surface, data: { awaiting: 'buttons' } },
      replies: [reply.text(surface, 'stats_period_prompt', undefined, periodButtons())]
    }
  }

  async function showFilter(state: ChoosingPeriod, period: ReportPeriod): Promise<StepResult> {
    const { surface } = state
    return guardStorage(deps, 'stats', surface, async () => {
      const children = await listChildren()
      const buttons = singleColumn([
        reply.button('stats_all_children', 'stats_participant:'),
        ...children.map((child, i) => ({ text: `👶 ${child.name}`, payload: `stats_participant:${i}` }))
      ])
      return {
        state: { command: 'stats', step: 2, surface, data: { period } },
        replies: [reply.text(surface, 'stats_participant_prompt', undefined, buttons)]
      }
    })
  }

  // an empty value selects all children, otherwise an index into the children list
  async function sendReport(state: ChoosingFilter, value: string): Promise<StepResult> {
    const { surface } = state
    const { period } = state.data
    const index = value === '' ? null : parseIndex(value)
    if (value !== '' && index === null) {
      return { state, replies: [reply.text(surface, 'stats_invalid_participant')] }
    }

    return guardStorage(deps, 'stats', surface, async () => {
      let participantName = ''
      if (index !== null) {
        const child: Participant | undefined = (await listChildren())[index]
        if (child === undefined) {
          logger.warn({ event: 'stats_invalid_participant_index', index })
          return { state, replies: [reply.text(surface, 'stats_invalid_participant')] }
        }
        participantName = child.name
      }

      const stats = await storage.getTopBooks(TOP_BOOKS_LIMIT, period.startDate, period.endDate, participantName)
      logger.info({ event: 'stats_report_generated', bookCount: stats.length, participantName, ...period })
      if (stats.length === 0) {
        return completed('stats', surface, [reply.text(surface, 'stats_no_events')])
      }
      return completed('stats', surface, [{ surface, text: renderReport(period, participantName, stats) }])
    })
  }

  async function handleText(state: StatsState, text: string): Promise<StepResult> {
    if (state.step === 2) {
      return { state, replies: [reply.text(state.surface, 'stats_use_participant_buttons')] }
    }

    const input = text.trim()
    switch (state.data.awaiting) {
      case 'buttons':
        return { state, replies: [reply.text(state.surface, 'stats_use_period_buttons')] }
      case 'month': {
        const period = parseMonth(input)
        if (period === null) {
          return { state, replies: [reply.text(state.surface, 'stats_invalid_month')] }
        }
        return showFilter(state, period)
      }
      case 'year': {
        const period = parseYear(input)
        if (period === null) {
          return { state, replies: [reply.text(state.surface, 'stats_invalid_year')] }
        }
        return showFilter(state, period)
      }
    }
  }

  async function handleButton(state: StatsState, prefix: string, value: string): Promise<StepResult> {
    if (state.step === 1 && prefix === 'stats_period') {
      if (value === 'month' || value === 'year') {
        return {
          state: { ...state, data: { awaiting: value } },
          replies: [reply.text(state.surface, value === 'month' ? 'stats_month_prompt' : 'stats_year_prompt')]
        }
      }
      const months = ROLLING_WINDOWS.get(value)
      if (months === undefined) {
        return { state, replies: [] }
      }
      return showFilter(state, lastMonthsPeriod(clock(), months))
    }
    if (state.step === 2 && prefix === 'stats_participant') {
      return sendReport(state, value)
    }

    logger.warn({ event: 'stats_stale_button', step: state.step, prefix, value })
    return { state, replies: [] }
  }

  return { begin, handleText, handleButton }
}

export type StatsReportDialog = ReturnType<typeof createStatsReportDialog>
