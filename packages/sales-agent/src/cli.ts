#!/usr/bin/env node
// Sales Insight — command-line interface
//
// Usage:
//   sales setup                                          # load, embed and index the transactions
//   sales query "Which territory grows fastest?" --scope territory
//   sales customer "Land of Toys"                        # customer analysis
//   sales pitch "Land of Toys" --focus "Classic Cars"    # personalized pitch
//   sales top-customers --limit 5
//   sales chat                                           # interactive REPL
//   sales --help

import 'dotenv/config';
import { createInterface } from 'node:readline';
import { assertStartupReady, loadSettings } from '../config/settings.js';
import { createAppContext } from '../orchestrator/app-context.js';
import { logDomainEvents } from '../orchestrator/event-log.js';
import { SalesService, type ApiResponse } from '../orchestrator/sales-service.js';
import { formatCurrency, formatPercent, formatScore } from '../embeddings/text-synthesizer.js';
import { errorMessage } from '../utils/errors.js';
import { UsageError, parseArgs, type ParsedArgs } from './cli-args.js';

// ── ANSI helpers (no chalk dependency) ──────────────────────────────

const isTTY = process.stdout.isTTY ?? false;

const ansi = {
  reset: isTTY ? '\x1b[0m' : '',
  bold: isTTY ? '\x1b[1m' : '',
  dim: isTTY ? '\x1b[2m' : '',
  cyan: isTTY ? '\x1b[36m' : '',
  green: isTTY ? '\x1b[32m' : '',
  yellow: isTTY ? '\x1b[33m' : '',
  red: isTTY ? '\x1b[31m' : '',
};

function c(color: keyof typeof ansi, text: string): string {
  return `${ansi[color]}${text}${ansi.reset}`;
}

// ── CLI class ───────────────────────────────────────────────────────

class SalesCli {
  async start(argv: string[]): Promise<number> {
    let args: ParsedArgs;
    try {
      args = parseArgs(argv);
    } catch (err) {
      if (!(err instanceof UsageError)) throw err;
      console.error(`  ${c('red', 'Error:')} ${err.message}\n`);
      this.printHelp();
      return 1;
    }

    if (args.command === 'help') {
      this.printHelp();
      return 0;
    }

    const settings = loadSettings();
    assertStartupReady(settings);
    const ctx = await createAppContext(settings);
    logDomainEvents(ctx.events);
    const service = new SalesService(ctx);

    try {
      return await this.run(service, args);
    } finally {
      await ctx.close();
    }
  }

  private async run(service: SalesService, args: ParsedArgs): Promise<number> {
    switch (args.command) {
      case 'setup': {
        console.log(`\n  ${c('bold', 'Sales Insight')} ${c('dim', '— building the vector index')}\n`);
        const started = Date.now();
        return this.print(await service.rebuildIndex(), (report) => {
          const seconds = ((Date.now() - started) / 1000).toFixed(1);
          const lines = [
            `${c('green', '✓')} ${c('bold', 'Index rebuilt')} ${c('dim', `— ${seconds}s`)}`,
            `Records: ${report.summary.totalRecords} | Customers: ${report.summary.totalCustomers} | Products: ${report.summary.totalProducts} | Territories: ${report.summary.totalTerritories}`,
            `Embeddings stored: ${report.recordsGenerated} (${report.notEnriched} not enriched, ${report.notEmbedded} zero-vector)`,
          ];
          return lines.map((l) => `  ${l}`).join('\n');
        });
      }
      case 'query':
        return this.print(await service.query(this.require(args.text, 'query'), args.scope), (r) =>
          this.answer(r.answer, `${r.contextCount} context items | scope: ${r.scope}`),
        );
      case 'chat':
        await this.startRepl(service, args);
        return 0;
      case 'customer':
        return this.print(await service.analyzeCustomer(this.require(args.text, 'customer name')), (r) =>
          r.found ? this.answer(r.analysis, `customer: ${r.customer.key}`) : r.error,
        );
      case 'territory':
        return this.print(await service.analyzeTerritory(this.require(args.text, 'territory name')), (r) =>
          this.answer(r.analysis, r.territory ? `territory: ${r.territory.key}` : 'no matching territory'),
        );
      case 'recommend':
        return this.print(await service.recommendProducts(this.require(args.text, 'customer criteria')), (r) =>
          this.answer(r.recommendations, `${r.productsAnalyzed} products analyzed`),
        );
      case 'pitch':
        return this.print(await service.generatePitch(this.require(args.text, 'customer name'), args.focus), (r) =>
          this.answer(r.pitch, `personalization level: ${r.personalizationLevel}`),
        );
      case 'insights':
        return this.print(await service.getInsights(this.require(args.text, 'query')), (r) =>
          this.answer(r.insights, `${r.dataPointsAnalyzed} data points analyzed`),
        );
      case 'top-customers':
        return this.print(await service.topCustomers(args.limit), ({ customers }) =>
          customers
            .map(
              (cu, i) =>
                `  ${String(i + 1).padStart(2)}. ${c('cyan', cu.name)} ${formatCurrency(cu.totalSales)} ` +
                c('dim', `(${cu.totalOrders} orders, ${cu.territory}, ${cu.status})`),
            )
            .join('\n'),
        );
      case 'top-products':
        return this.print(await service.topProducts(args.limit), ({ products }) =>
          products
            .map(
              (p, i) =>
                `  ${String(i + 1).padStart(2)}. ${c('cyan', p.key)} score ${formatScore(p.performanceScore)} ` +
                c('dim', `(${formatCurrency(p.totalSales)}, ${p.orderCount} orders)`),
            )
            .join('\n'),
        );
      case 'territories':
        return this.print(await service.territoryInsights(), (t) =>
          t.territoryBreakdown
            .map(
              (row) =>
                `  ${c('cyan', row.name.padEnd(10))} ${formatCurrency(row.totalSales).padStart(16)} ` +
                `${formatPercent(row.marketShare).padStart(8)} ${c('dim', `${row.uniqueCustomers} customers`)}`,
            )
            .join('\n'),
        );
      case 'stats':
        return this.print(await service.stats(), (s) => JSON.stringify(s, null, 2));
      case 'health':
        return this.print(await service.health(), (h) => JSON.stringify(h, null, 2));
      case 'clear':
        return this.print(await service.clearIndex(), () => `  ${c('green', '✓')} Vector store cleared`);
      case 'help':
        this.printHelp();
        return 0;
    }
  }

  // ── Interactive REPL ────────────────────────────────────────────

  private async startRepl(service: SalesService, args: ParsedArgs): Promise<void> {
    console.log(`\n  ${c('bold', 'Sales Insight')} ${c('dim', `— scope: ${args.scope}`)}`);
    console.log(`  ${c('dim', 'Ask a question, or type exit to quit.')}\n`);

    const rl = createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: `${c('cyan', 'sales>')} `,
    });

    rl.prompt();
    for await (const line of rl) {
      const input = line.trim();
      if (input === 'exit' || input === 'quit') break;
      if (input) {
        this.print(await service.query(input, args.scope), (r) => this.answer(r.answer, `${r.contextCount} context items`));
      }
      rl.prompt();
    }
    rl.close();
    console.log(`  ${c('dim', 'Goodbye.')}\n`);
  }

  // ── Output ──────────────────────────────────────────────────────

  private print<T>(res: ApiResponse<T>, render: (data: T) => string): number {
    if (!res.success) {
      console.error(`  ${c('red', 'Error:')} ${res.message}\n`);
      return 1;
    }
    console.log(render(res.data));
    console.log();
    return 0;
  }

  private answer(text: string, footer: string): string {
    return `\n${text}\n\n  ${c('dim', footer)}`;
  }

  private require(text: string, what: string): string {
    if (!text) throw new UsageError(`No ${what} provided. Use "sales --help" for usage.`);
    return text;
  }

  private printHelp(): void {
    console.log(`
  ${c('bold', 'Sales Insight')} — sales analytics with grounded answers

  ${c('bold', 'Usage:')}
    sales <command> [arguments] [options]

  ${c('bold', 'Commands:')}
    setup                       Load transactions, embed aggregates, rebuild the index
    query <text>                Answer a question from retrieved context
    chat                        Interactive question loop
    customer <name>             Analyze a customer (partial names match)
    territory <name>            Analyze a territory
    recommend <criteria>        Recommend products for a customer profile
    pitch <customer>            Write a personalized sales pitch
    insights <text>             Strategic insights across all data
    top-customers               Customers ranked by total sales
    top-products                Products ranked by performance score
    territories                 Territory breakdown and market share
    stats                       Aggregate and vector store counts
    health                      Vector store health
    clear                       Drop and recreate the vector collection

  ${c('bold', 'Options:')}
    --scope <all|customer|product|territory>   Retrieval scope for query and chat
    --focus <text>                             Product focus for pitch
    --limit <n>                                Result count for top-N (default 10)
    -h, --help                                 Show this help
`);
  }
}

// ── Main ────────────────────────────────────────────────────────────

const cli = new SalesCli();
cli
  .start(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (err instanceof UsageError) {
      console.error(`  ${c('red', 'Error:')} ${err.message}\n`);
    } else {
      console.error(`  ${c('red', 'Fatal:')} ${errorMessage(err)}\n`);
    }
    process.exitCode = 1;
  });
