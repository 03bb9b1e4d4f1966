/**
 * CLI Logger Utility
 *
 * Human-facing terminal output; the service itself logs JSON through Pino.
 */

export const logger = {
  info: (msg: string) => console.log(`ℹ️  ${msg}`),
  success: (msg: string) => console.log(`✅ ${msg}`),
  warn: (msg: string) => console.log(`⚠️  ${msg}`),
  error: (msg: string) => console.error(`❌ ${msg}`),

  section: (title: string) => {
    console.log(`\n${'='.repeat(60)}`);
    console.log(`  ${title}`);
    console.log(`${'='.repeat(60)}\n`);
  },

  subsection: (title: string) => {
    console.log(`\n${title}`);
    console.log(`${'-'.repeat(title.length)}`);
  },

  table: (data: Record<string, string | number>[]) => {
    if (data.length === 0) {
      console.log('  (no data)');
      return;
    }
    console.table(data);
  },

  json: (data: unknown) => {
    console.log(JSON.stringify(data, null, 2));
  }
};
