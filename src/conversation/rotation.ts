import type { Participant } from '../storage/types.js'

/**
 * Picks who should read next. Children take turns in the order given, which is the
 * name order `LibraryStorage.listParticipants` returns; after the last child the
 * turn goes to the parents (the first two are offered as "A or B"), and any parent
 * reading restarts the cycle with the first child.
 *
 * Returns an empty string when there are no children to rotate through.
 */
export function computeNextReader(participants: readonly Participant[], lastReaderName: string): string {
  const children = participants.filter(p => !p.isParent)
  const parents = participants.filter(p => p.isParent)

  const [firstChild] = children
  if (firstChild === undefined) {
    return ''
  }

  if (lastReaderName === '' || parents.some(p => p.name === lastReaderName)) {
    return firstChild.name
  }

  const index = children.findIndex(c => c.name === lastReaderName)
  if (index === -1) {
    return firstChild.name
  }

  const nextChild = children[index + 1]
  if (nextChild !== undefined) {
    return nextChild.name
  }

  if (parents.length === 0) {
    return firstChild.name
  }

  return parents.slice(0, 2).map(p => p.name).join(' or ')
}
