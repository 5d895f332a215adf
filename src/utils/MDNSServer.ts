import { EventEmitter } from 'events'
import type { RecordType, SrvAnswer, StringAnswer, TxtAnswer } from 'dns-packet'
import deepEqual from 'fast-deep-equal'
import mDNS from 'multicast-dns'
import type { MulticastDNS, QueryPacket } from 'multicast-dns'

import { responderDebug } from './debug'
import { nameEquals } from './dns-utils'

/**
 * Represents a DNS Resource Record relevant for mDNS responses.
 */
export type MDNSRecord = StringAnswer | TxtAnswer | SrvAnswer

type EventMap = {
  responded: [packet: mDNS.ResponseOutgoingPacket, error: Error | null]
}

// MARK: MDNSServer
/**
 * Owns the `multicast-dns` socket of a backend and answers queries for the records published through it.
 *
 * Answers to a PTR question carry the SRV and TXT records of the instance as additionals, and answers that
 * name an SRV target carry its A/AAAA records, so a browser can usually resolve from a single packet.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc6762
 */
export class MDNSServer extends EventEmitter<EventMap> {
  readonly mdns: MulticastDNS

  private typeToRecords = new Map<RecordType, MDNSRecord[]>()

  /**
   * @param options - Configuration passed to the underlying `multicast-dns` instance.
   */
  constructor(options: mDNS.Options = {}) {
    super()

    this.mdns = mDNS(options)
    this.mdns.setMaxListeners(0)
    this.mdns.on('query', q => this.respond(q))
  }

  get recordCount(): number {
    let count = 0
    for (const records of this.typeToRecords.values()) {
      count += records.length
    }
    return count
  }

  /**
   * Adds records to the answer set. Records equal in type, name and data to a registered one are ignored.
   */
  register(records: MDNSRecord[]): void {
    for (const record of records) {
      const registered = this.typeToRecords.get(record.type) ?? []
      if (registered.every(r => !isSameRecord(r, record))) {
        registered.push(record)
      }
      this.typeToRecords.set(record.type, registered)
    }
  }

  /**
   * Removes records from the answer set.
   *
   * PTR records are matched on name and target, since many instances share one PTR name;
   * every other type is matched on name alone.
   */
  unregister(records: MDNSRecord[]): void {
    for (const record of records) {
      const registered = this.typeToRecords.get(record.type) ?? []
      const filtered = registered.filter(r =>
        record.type === 'PTR' ? !isSameRecord(r, record) : !nameEquals(r.name, record.name),
      )
      if (filtered.length > 0) {
        this.typeToRecords.set(record.type, filtered)
      } else {
        this.typeToRecords.delete(record.type)
      }
    }
  }

  /**
   * Multicasts records, resolving once the packet is sent.
   */
  async send(records: MDNSRecord[]): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.mdns.respond(records, error => {
        if (error) {
          reject(error)
        } else {
          resolve()
        }
      })
    })
  }

  async destroy(): Promise<void> {
    this.typeToRecords.clear()
    return new Promise<void>(resolve => {
      this.mdns.destroy(resolve)
    })
  }

  // MARK: private
  /**
   * Returns all records of a given type matching a name.
   */
  private getRecordsOf(type: RecordType, name: string): MDNSRecord[] {
    return (this.typeToRecords.get(type) ?? []).filter(record => nameEquals(record.name, name))
  }

  /**
   * Responds to incoming mDNS queries with matching registered records.
   *
   * @see {@link https://www.rfc-editor.org/rfc/rfc6763#section-12 | RFC 6763 §12 Populating the DNS with Information}
   */
  private respond(query: QueryPacket): void {
    for (const question of query.questions) {
      const queryType: RecordType | 'ANY' = question.type
      const queryName = question.name

      let answers: MDNSRecord[]
      if (queryType === 'ANY') {
        answers = Array.from(this.typeToRecords.keys()).flatMap(type => this.getRecordsOf(type, queryName))
      } else {
        answers = this.getRecordsOf(queryType, queryName)
      }

      if (answers.length === 0) continue

      const additionals: MDNSRecord[] = []
      for (const answer of answers) {
        if (answer.type === 'PTR') {
          additionals.push(...this.getRecordsOf('SRV', answer.data))
          additionals.push(...this.getRecordsOf('TXT', answer.data))
        }
      }

      const targets = new Set<string>()
      for (const record of [...answers, ...additionals]) {
        if (record.type === 'SRV') {
          targets.add(record.data.target)
        }
      }
      for (const target of targets) {
        additionals.push(...this.getRecordsOf('A', target))
        additionals.push(...this.getRecordsOf('AAAA', target))
      }

      const packet: mDNS.ResponseOutgoingPacket = { answers, additionals }
      responderDebug('answering %s %s with %d records', queryType, queryName, answers.length + additionals.length)
      this.mdns.respond(packet, error => {
        if (error) {
          console.warn('Error while answering mDNS query:', error)
        }
        this.emit('responded', packet, error)
      })
    }
  }
}

function isSameRecord(a: MDNSRecord, b: MDNSRecord): boolean {
  return a.type === b.type && nameEquals(a.name, b.name) && deepEqual(a.data, b.data)
}
