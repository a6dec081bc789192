/**
 * Quick Start Example
 *
 * Deduplicates a reference list merged from a BibTeX file and a Springer CSV
 * export. It shows how to:
 * - Attach field mappings to records from different export formats
 * - Run the identifier pass followed by the title/author pass
 * - Log each duplicate found
 * - Read the resulting partition
 */

import {
  Dedup,
  FieldMappings,
  LoggerLogSink,
  createRecords,
  defaultLogger,
} from '../src/index.js'

// Entries as a BibTeX parser would return them
const bibEntries = createRecords(
  [
    {
      title: 'Property-Based Testing for Web APIs',
      author: 'Okafor, C. and Lind, E.',
      year: '2021',
      doi: '10.4/pbt',
    },
    {
      title: 'Search-Based Test Generation',
      author: 'Moreau, P.',
      year: '2017',
      doi: '',
    },
  ],
  'refs/library.bib'
)

// Rows of a Springer search export, read with their own column names
const springerRows = createRecords(
  [
    {
      'Item Title': 'Property-based testing for Web APIs',
      Authors: 'Okafor, C. and Lind, E.',
      'Publication Year': '2021',
      'Item DOI': '10.4/PBT',
    },
    {
      'Item Title': 'Search Based Test Generation',
      Authors: 'Moreau, P',
      'Publication Year': '2017',
      'Item DOI': '',
    },
    {
      'Item Title': 'Fuzzing Network Protocols',
      Authors: 'Haddad, S.',
      'Publication Year': '2023',
      'Item DOI': '10.8/fnp',
    },
  ],
  'exports/springer.csv',
  FieldMappings.springerCsv
)

const detector = Dedup.create()
  // Records without their own mapping are read as BibTeX
  .fieldMapping(FieldMappings.bibtex)
  // Identical DOIs (ignoring case) are duplicates
  .exactKey('identifier')
  // Near-identical titles with similar authors are duplicates too
  .fuzzy((fuzzy) => fuzzy.titleThreshold(0.95).authorThreshold(0.8))
  .logger(defaultLogger)
  .logSink(new LoggerLogSink(defaultLogger))
  .build()

console.log('=== Quick Start Example ===\n')

const { partition, stats, sinkFailures } = detector.detect([...bibEntries, ...springerRows])

console.log(`\nUnique entries (${partition.unique.length}):`)
for (const record of partition.unique) {
  console.log(`  ${record.sourceId} #${record.originIndex}`)
}

console.log(`\nDuplicate groups (${partition.duplicates.length}):`)
for (const group of partition.duplicates) {
  const duplicates = group.duplicates
    .map((record) => `${record.sourceId} #${record.originIndex}`)
    .join(', ')
  console.log(
    `  [${group.method}] ${group.original.sourceId} #${group.original.originIndex} <- ${duplicates}`
  )
}

console.log(`\nComparisons made: ${stats.comparisonsMade}`)
console.log(`Comparisons skipped by the prefilter: ${stats.comparisonsSkipped}`)

if (sinkFailures.length > 0) {
  console.error(`${sinkFailures.length} log sink failures`)
}
