import { Bench } from 'tinybench';
import { z } from 'zod';

import {
  Analyzer,
  Attach,
  Marker,
  MemoryCacheAnalyzer,
  Prop,
  type ParsesProperties,
  type Reflectable,
  type SubjectFacts,
} from '../src/index.js';

/**
 * Analyzer Benchmark
 *
 * Measures a full class resolution (class marker, reflection, one property
 * map) against the same resolution served from the memory cache.
 */

const ColumnFields = z.object({ name: z.string().optional(), nullable: z.boolean().default(false) });

@Marker({ fields: ColumnFields })
class Column implements Reflectable {
  name?: string;
  nullable: boolean;
  constructor(fields: z.infer<typeof ColumnFields>) {
    this.name = fields.name;
    this.nullable = fields.nullable;
  }
  fromReflection(facts: SubjectFacts) {
    this.name ??= facts.name;
  }
}

const TableFields = z.object({ name: z.string().optional() });

@Marker({ fields: TableFields, inheritable: true })
class Table implements Reflectable, ParsesProperties<Column> {
  name?: string;
  columns: ReadonlyMap<string, Column> = new Map();
  constructor(fields: z.infer<typeof TableFields>) {
    this.name = fields.name;
  }
  fromReflection(facts: SubjectFacts) {
    this.name ??= facts.name.toLowerCase();
  }
  propertyMarker() {
    return Column;
  }
  includePropertiesByDefault() {
    return true;
  }
  setProperties(properties: ReadonlyMap<string, Column>) {
    this.columns = properties;
  }
}

@Attach(Table, { name: 'users' })
class User {
  @Attach(Column, { name: 'user_id' })
  id = 0;

  @Prop()
  email = '';

  @Attach(Column, { nullable: true })
  nickname?: string;
}

class Admin extends User {
  @Prop()
  level = 1;
}

async function runAnalyzerBenchmark() {
  console.log('=== Analyzer Benchmark ===\n');

  const bench = new Bench({ time: 1000 });
  const analyzer = new Analyzer();
  const cached = new MemoryCacheAnalyzer(new Analyzer());
  cached.analyze(Admin, Table);

  bench
    .add('A1: Analyzer: full resolution', () => {
      analyzer.analyze(User, Table);
    })
    .add('A2: Analyzer: inherited class marker + inherited members', () => {
      analyzer.analyze(Admin, Table);
    })
    .add('A3: MemoryCacheAnalyzer: cached hit', () => {
      cached.analyze(Admin, Table);
    });

  console.log(`[phase] running ${bench.tasks.length} tasks...`);
  await bench.run();
  console.table(bench.table());

  const getNs = (name: string) => {
    const task = bench.tasks.find((t) => t.name === name);
    return (task?.result?.mean ?? 0) * 1_000_000;
  };

  console.log('\nPer call:');
  for (const task of bench.tasks) {
    console.log(`  ${task.name}: ${getNs(task.name).toFixed(0)} ns`);
  }
}

runAnalyzerBenchmark().catch(console.error);
