#!/usr/bin/env node
import 'dotenv/config';
import { readFileSync } from 'fs';
import chalk from 'chalk';
import { loadConfig, type CliConfig, type CliConfigOverrides } from './config.js';
import { parseTurtle } from './io/turtle.js';
import { applyResiduePolicy } from './policy.js';
import { translateDocument } from './translation/assembler.js';
import { TranslationException, serializeDiagnostic } from './types/errors.js';
import { formatDiagnostic, formatSummary, formatTriple, summarize } from './utils/formatting.js';

const VERSION = '0.3.0';
const HELP = `
OWL RDF Translator v${VERSION}

Usage:
  owl-rdf translate <file.ttl>   Translate the graph into axioms
  owl-rdf residue <file.ttl>     List triples no axiom or expression claimed
  owl-rdf check <file.ttl>       List diagnostics; exit 1 on any problem

Options:
  --format=<name>    Output format (summary, json)
  --residue=<name>   Residue policy for translate (ignore, warn, error)
  --base=<iri>       Base IRI for relative references
  --help, -h         Show this help
  --version, -v      Show version

Environment:
  OWL_RDF_FORMAT, OWL_RDF_RESIDUE_POLICY, OWL_RDF_BASE_IRI

Examples:
  owl-rdf translate --format=json pizza.ttl
  owl-rdf check --base=http://example.org/ ontology.ttl
`;

const FLAGS: Record<string, keyof CliConfig> = {
    '--format': 'format',
    '--residue': 'residuePolicy',
    '--base': 'baseIri',
};

const args = process.argv.slice(2);
const overrides: CliConfigOverrides = {};
const cleanArgs: string[] = [];

for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const eq = arg.indexOf('=');
    const flag = eq >= 0 ? arg.slice(0, eq) : arg;
    const key = FLAGS[flag];
    if (key && eq >= 0) {
        overrides[key] = arg.slice(eq + 1);
    } else if (key) {
        if (i + 1 < args.length) {
            overrides[key] = args[i + 1];
            i++;
        }
    } else if (!arg.startsWith('-')) {
        cleanArgs.push(arg);
    }
}

const commandName = cleanArgs[0];
const fileName = cleanArgs[1];

async function main() {
    if (args.includes('--help') || args.includes('-h') || !commandName) {
        console.log(HELP);
        return;
    }

    if (args.includes('--version') || args.includes('-v')) {
        console.log(VERSION);
        return;
    }

    if (!['translate', 'residue', 'check'].includes(commandName)) {
        console.error(chalk.red(`Unknown command: ${commandName}`));
        console.log(HELP);
        process.exit(1);
    }

    if (!fileName) {
        console.error(chalk.red('Error: file argument required'));
        process.exit(1);
    }

    const config = loadConfig(overrides);
    const content = readFileSync(fileName, 'utf-8');
    const triples = parseTurtle(content, { baseIri: config.baseIri });
    const result = translateDocument(triples);

    switch (commandName) {
        case 'translate': {
            if (config.format === 'json') {
                console.log(JSON.stringify({
                    ontology: result.ontology,
                    axioms: result.axioms,
                    expressions: result.expressions,
                    residue: result.residue.map(formatTriple),
                    diagnostics: result.diagnostics.map(serializeDiagnostic),
                }, null, 2));
            } else {
                console.log(chalk.bold(`Translated ${triples.length} triples from ${fileName}`));
                if (result.ontology.iri) console.log(chalk.dim(`Ontology: ${result.ontology.iri}`));
                console.log(formatSummary(summarize(result)));
            }
            applyResiduePolicy(result, config.residuePolicy);
            break;
        }
        case 'residue': {
            if (config.format === 'json') {
                console.log(JSON.stringify(result.residue.map(formatTriple), null, 2));
            } else {
                result.residue.forEach(t => console.log(formatTriple(t)));
                console.log(chalk.dim(`(${result.residue.length} unconsumed of ${triples.length} triples)`));
            }
            break;
        }
        case 'check': {
            const problems = result.diagnostics.filter(d => d.code !== 'RESIDUE_TRIPLES');
            if (config.format === 'json') {
                console.log(JSON.stringify(result.diagnostics.map(serializeDiagnostic), null, 2));
            } else {
                for (const diagnostic of result.diagnostics) {
                    const line = formatDiagnostic(diagnostic);
                    console.log(diagnostic.code === 'RESIDUE_TRIPLES' ? chalk.dim(line) : chalk.red(`✗ ${line}`));
                }
                if (problems.length === 0) {
                    console.log(chalk.green('✓ No problems found'));
                }
            }
            process.exit(problems.length === 0 ? 0 : 1);
        }
    }
}

main().catch(e => {
    if (e instanceof TranslationException) {
        console.error(chalk.red(`✗ ${e.message}`));
        if (e.diagnostic.suggestion) console.error(chalk.dim(`  ${e.diagnostic.suggestion}`));
    } else {
        console.error(chalk.red('Error:'), e instanceof Error ? e.message : String(e));
    }
    process.exit(1);
});
