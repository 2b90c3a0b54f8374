export interface ReplySurface {
  chatId: number
  threadId?: number
}

export type InboundEvent =
  | { kind: 'text'; text: string; surface: ReplySurface }
  | { kind: 'button'; payload: string; surface: ReplySurface }

export interface Button {
  text: string
  payload: string
}

export type ButtonGrid = Button[][]

export interface OutboundMessage {
  surface: ReplySurface
  text: string
  buttons?: ButtonGrid
}

export interface ReplySender {
  send(message: OutboundMessage): Promise<void>
}

export const COMPLETED_STEP = -1

export type CommandName = 'start' | 'new_book' | 'read' | 'who_is_next' | 'last' | 'stats' | 'rare'

export type DialogCommand = 'new_book' | 'read' | 'stats'

export interface ReportPeriod {
  startDate: string
  endDate: string
  label: string
}

export interface NewBookState {
  command: 'new_book'
  step: 1
  surface: ReplySurface
  data: Record<string, never>
}

export type ReadState =
  | { command: 'read'; step: 1; surface: ReplySurface; data: { awaitingCustomDate: boolean } }
  | { command: 'read'; step: 2; surface: ReplySurface; data: { date: string; page: number } }
  | { command: 'read'; step: 3; surface: ReplySurface; data: { date: string; bookName: string } }

export type StatsState =
  | { command: 'stats'; step: 1; surface: ReplySurface; data: { awaiting: 'buttons' | 'month' | 'year' } }
  | { command: 'stats'; step: 2; surface: ReplySurface; data: { period: ReportPeriod } }

export interface CompletedState {
  command: DialogCommand
  step: typeof COMPLETED_STEP
  surface: ReplySurface
  data: Record<string, never>
}

export type ActiveState = NewBookState | ReadState | StatsState

export type ConversationState = ActiveState | CompletedState

export interface StepResult {
  state: ConversationState | null
  replies: OutboundMessage[]
}

export interface ConversationStore {
  get(userId: number): ConversationState | undefined
  set(userId: number, state: ConversationState): void
  delete(userId: number): void
  cleanup(): number
  size(): number
}

export type Clock = () => Date
