export interface Book {
  id: string
  name: string
  isReadable: boolean
}

export interface Participant {
  id: string
  name: string
  isParent: boolean
}

export interface ReadingEvent {
  /** YYYY-MM-DD */
  date: string
  bookName: string
  participantName: string
}

export interface BookStat {
  bookName: string
  readCount: number
}

export interface RareBookStat {
  bookName: string
  lastReadDate: string | null
  /** -1 when the book was never read */
  daysSinceLastRead: number
}

export interface LibraryStorage {
  initialize(): Promise<void>
  createBook(name: string): Promise<string>
  /** Readable books ordered by name. */
  listReadableBooks(): Promise<Book[]>
  /** All participants ordered by name. */
  listParticipants(): Promise<Participant[]>
  createEvent(date: string, bookName: string, participantName: string): Promise<void>
  /** Most recent first. */
  getLastEvents(limit: number): Promise<ReadingEvent[]>
  /**
   * Books ranked by read count (descending, ties by name) between two inclusive dates.
   * An empty participant name counts reads by all children.
   */
  getTopBooks(limit: number, startDate: string, endDate: string, participantName: string): Promise<BookStat[]>
  /** Never-read books first, then the ones read longest ago. */
  getRarelyReadBooks(limit: number, childrenOnly: boolean): Promise<RareBookStat[]>
  close(): Promise<void>
}
