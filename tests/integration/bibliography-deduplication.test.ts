import { describe, it, expect, vi } from 'vitest'
import {
  Dedup,
  FieldMappings,
  LoggerLogSink,
  MemoryLogSink,
  createRecords,
  type Logger,
  type SourceRecord,
} from '../../src'
import { sampleBibliography } from '../fixtures/records'

function mixedSources(): SourceRecord[] {
  const acm = createRecords(
    [
      {
        title: 'Flaky Test Detection at Scale',
        author: 'Kim, H. and Ortiz, M.',
        doi: '10.7/FTD',
        year: '2022',
      },
      {
        title: 'Mutation Analysis in Practice',
        author: 'Nguyen, T.',
        doi: '',
        year: '2019',
      },
    ],
    'refs/acm.bib'
  )
  const springer = createRecords(
    [
      {
        'Item Title': 'Flaky test detection at scale',
        Authors: 'Kim, H. and Ortiz, M.',
        'Item DOI': '10.7/ftd',
        'Publication Year': '2022',
      },
      {
        'Item Title': 'Mutation Analysis in Practice.',
        Authors: 'Nguyen, T',
        'Item DOI': '',
        'Publication Year': '2019',
      },
    ],
    'exports/springer.csv',
    FieldMappings.springerCsv
  )
  const wos = createRecords(
    [
      {
        'Article Title': 'Regression Test Selection Revisited',
        Authors: 'Silva, R.',
        DOI: '10.3/rts',
        'Publication Year': '2020',
      },
      {
        'Article Title': 'Flaky Test Detection At Scale',
        Authors: 'Kim, H.; Ortiz, M.',
        DOI: '10.7/FTD ',
        'Publication Year': '2022',
      },
    ],
    'exports/wos.xlsx',
    FieldMappings.webOfScienceXlsx
  )
  return [...acm, ...springer, ...wos]
}

describe('Integration: bibliography deduplication', () => {
  it('deduplicates records merged from several export formats', () => {
    const records = mixedSources()
    const detector = Dedup.create()
      .fieldMapping(FieldMappings.bibtex)
      .exactKey('identifier')
      .fuzzy((fuzzy) => fuzzy.titleThreshold(0.95).authorThreshold(0.8))
      .build()

    const { partition, stats } = detector.detect(records)

    expect(partition.unique).toEqual([records[0], records[1], records[4]])
    expect(partition.duplicates).toEqual([
      { original: records[0], duplicates: [records[2], records[5]], method: 'exact-key' },
      { original: records[1], duplicates: [records[3]], method: 'fuzzy' },
    ])
    expect(stats.duplicatesFound).toBe(3)
    expect(stats.duplicatesByMethod).toEqual({ 'exact-key': 2, 'group-key': 0, fuzzy: 1 })
  })

  it('reports each duplicate through a logger-backed sink', () => {
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }

    const result = Dedup.create()
      .fieldMapping(FieldMappings.bibtex)
      .exactKey('identifier')
      .logSink(new LoggerLogSink(logger))
      .build()
      .detect(mixedSources())

    expect(result.sinkFailures).toEqual([])
    expect(logger.info).toHaveBeenCalledTimes(3)
    expect(logger.info).toHaveBeenNthCalledWith(
      1,
      [
        'Duplicate found by identifier match:',
        '  Original entry from: refs/acm.bib #0',
        '  title: Flaky Test Detection at Scale',
        '  author: Kim, H. and Ortiz, M.',
        '  year: 2022',
        '  identifier: 10.7/FTD',
        '  Duplicate entry from: exports/springer.csv #0',
      ].join('\n'),
      { runId: result.runId }
    )
    expect(logger.debug).toHaveBeenCalledWith('Logged 3 duplicates', { runId: result.runId })
  })

  it('reports duplicates with their own source field values', () => {
    const sink = new MemoryLogSink()

    Dedup.create()
      .fieldMapping(FieldMappings.bibtex)
      .exactKey('identifier')
      .logSink(sink)
      .build()
      .detect(mixedSources())

    const [first, second, third] = sink.getEntries()
    expect(first.duplicate.fields.title).toBe('Flaky test detection at scale')
    expect(second.duplicate).toEqual({
      sourceId: 'exports/wos.xlsx',
      originIndex: 1,
      fields: {
        title: 'Flaky Test Detection At Scale',
        author: 'Kim, H.; Ortiz, M.',
        year: '2022',
        identifier: '10.7/FTD ',
      },
    })
    expect(third.method).toBe('fuzzy')
  })

  it('finds composite key duplicates without a fuzzy pass', () => {
    const records = sampleBibliography()

    const { partition } = Dedup.create()
      .groupKey(['title', 'author', 'year'])
      .withoutFuzzy()
      .build()
      .detect(records)

    expect(partition.duplicates).toEqual([
      { original: records[0], duplicates: [records[1]], method: 'group-key' },
    ])
    expect(partition.unique).toHaveLength(5)
  })

  it('produces the same partition on repeated runs', () => {
    const detector = Dedup.create().exactKey('doi').build()
    const records = sampleBibliography()

    expect(detector.detect(records).partition).toEqual(detector.detect(records).partition)
  })
})
