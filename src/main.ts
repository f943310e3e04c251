#!/usr/bin/env node
import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import { confirm, input } from '@inquirer/prompts';
import chalk from 'chalk';
import ora from 'ora';
import { loadConfig } from './config';
import { type Container, createContainer } from './container';
import type { Answer } from './core/answer-synthesizer';
import { QueryHandler } from './core/query-handler';
import type { SummaryResult } from './core/summarizer';
import { ValidationError, getErrorMessage } from './errors';
import { logger } from './utils/logger';

const program = new Command();

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function parseThreshold(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new InvalidArgumentError('Expected a number between 0 and 1.');
  }
  return parsed;
}

/** Ctrl+C inside an inquirer prompt rejects with this error name. */
function isPromptExit(error: unknown): boolean {
  return error instanceof Error && error.name === 'ExitPromptError';
}

async function withContainer(work: (container: Container) => Promise<void>): Promise<void> {
  const config = loadConfig();
  logger.setLevel(config.logLevel);
  const container = createContainer(config);
  try {
    await work(container);
  } finally {
    await container.close();
  }
}

function printAnswer(answer: Answer): void {
  if (answer.status === 'failed') {
    logger.error(`📝 Answer: ${answer.answer}`);
    if (answer.error) logger.source(`   ${answer.error}`);
    return;
  }

  logger.success(`📝 Answer: ${answer.answer}`);
  if (answer.sources.length === 0) return;

  logger.source(`Sources: ${QueryHandler.sourceFiles(answer).join(', ')}`);
  answer.sources.forEach((source) => {
    logger.source(`  - ${source.filename} (${source.similarity.toFixed(3)}): ${source.excerpt.replace(/\s+/g, ' ')}`);
  });
  logger.source(`Confidence: ${answer.confidence.toFixed(2)}`);
}

program.name('docent').description('RAG for document Q&A').version('1.0.0');

program
  .command('init-db')
  .description('Create the database extension, tables and indexes')
  .action(() =>
    withContainer(async (container) => {
      const spinner = ora('🛠️  Creating schema').start();
      try {
        await container.migrate();
      } finally {
        spinner.stop();
      }
      logger.success('✅ Database ready');
    })
  );

program
  .command('ingest')
  .argument('[path]', 'file or directory to ingest')
  .description('Add documents to the knowledge base')
  .action((pathArgument: string | undefined) =>
    withContainer(async (container) => {
      const pathName = pathArgument ?? (await input({ message: 'Enter file or directory name' }));
      logger.info(`📂 Ingesting documents from: ${pathName}`);

      const result = await container.ingestHandler.run(pathName);
      logger.success(`✅ Documents ingested successfully (${result.processed} processed, ${result.skipped} skipped)`);
    })
  );

program
  .command('query')
  .description('Ask questions about your documents')
  .option('-s, --session <id>', 'continue an existing chat session', parsePositiveInteger)
  .option('-k, --top-k <n>', 'number of chunks to retrieve', parsePositiveInteger)
  .option('-t, --threshold <value>', 'minimum similarity between 0 and 1', parseThreshold)
  .action((options: { session?: number; topK?: number; threshold?: number }) =>
    withContainer(async (container) => {
      let sessionId = options.session;
      if (sessionId !== undefined) {
        const session = await container.chatStore.getSession(sessionId);
        if (!session) {
          throw new ValidationError(`Chat session ${sessionId} does not exist`);
        }
        logger.info(`💬 Continuing session "${session.name}" (${session.messages.length} messages)`);
      }

      logger.info("🤖 Ask your question (type 'exit' to quit)");

      while (true) {
        let question: string;
        try {
          question = await input({
            message: chalk.cyan('Question:'),
            validate: (value) => value.trim().length > 0 || 'Please enter a question',
          });
        } catch (error) {
          if (isPromptExit(error)) break;
          throw error;
        }

        if (question.trim().toLowerCase() === 'exit') break;

        const spinner = ora('🔍 Searching...').start();
        try {
          const retrieveOptions = { topK: options.topK, similarityThreshold: options.threshold };
          let answer: Answer;
          if (sessionId === undefined) {
            const started = await container.queryHandler.askInNewSession(
              question,
              question.trim().slice(0, 60),
              retrieveOptions
            );
            sessionId = started.sessionId;
            answer = started.answer;
          } else {
            answer = await container.queryHandler.ask(question, { ...retrieveOptions, sessionId });
          }
          spinner.stop();
          printAnswer(answer);
        } catch (error) {
          spinner.stop();
          logger.error(`Error: ${getErrorMessage(error)}`);
        }
      }

      if (sessionId !== undefined) {
        logger.info(`💾 Session saved as #${sessionId}`);
      }
    })
  );

program
  .command('list')
  .description('List ingested documents')
  .option('-f, --filter <term>', 'only documents whose name contains the term (case-insensitive)')
  .action((options: { filter?: string }) =>
    withContainer(async (container) => {
      const documents = await container.documents.listDocuments(options.filter);
      if (documents.length === 0) {
        if (options.filter) {
          logger.warning(`⚠️  No documents found matching '${options.filter}'`);
        } else {
          logger.info('📭 No documents ingested yet');
        }
        return;
      }

      logger.info(`📚 ${documents.length} document(s):`);
      documents.forEach((document) => {
        logger.info(`  - ${document.filename} (${document.chunkCount} chunks, added ${document.createdAt.toISOString()})`);
      });
    })
  );

program
  .command('show')
  .argument('<filename>', 'document to describe')
  .description('Show the chunk count, ingest date and metadata of a document')
  .action((filename: string) =>
    withContainer(async (container) => {
      const document = await container.documents.getDocument(filename);
      if (!document) {
        logger.warning(`⚠️  No document found with filename: ${filename}`);
        process.exitCode = 1;
        return;
      }

      logger.info(`📄 ${document.filename}`);
      logger.info(`   Chunks: ${document.chunkCount}`);
      logger.info(`   Added: ${document.createdAt.toISOString()}`);
      logger.info(`   Metadata: ${JSON.stringify(document.metadata, null, 2)}`);
    })
  );

program
  .command('delete')
  .argument('<filename>', 'document to remove')
  .description('Remove a document and all of its chunks')
  .action((filename: string) =>
    withContainer(async (container) => {
      if (await container.documents.deleteDocument(filename)) {
        logger.success(`✅ Deleted ${filename}`);
      } else {
        logger.warning(`⚠️  No document found with filename: ${filename}`);
        process.exitCode = 1;
      }
    })
  );

program
  .command('delete-all')
  .description('Remove every document from the knowledge base')
  .option('-y, --yes', 'skip the confirmation prompt')
  .action((options: { yes?: boolean }) =>
    withContainer(async (container) => {
      const confirmed =
        options.yes || (await confirm({ message: 'Delete ALL documents? This cannot be undone.', default: false }));
      if (!confirmed) {
        logger.info('Cancelled');
        return;
      }

      const deleted = await container.documents.deleteAllDocuments();
      logger.success(`✅ Deleted ${deleted} chunks`);
    })
  );

program
  .command('summarize')
  .argument('<filename>', 'document to summarize')
  .description('Summarize an ingested document')
  .action((filename: string) =>
    withContainer(async (container) => {
      const spinner = ora(`🧾 Summarizing ${filename}...`).start();
      let result: SummaryResult;
      try {
        result = await container.summarizer.summarize(filename);
      } finally {
        spinner.stop();
      }

      if (!result.success) {
        logger.error(result.summary);
        process.exitCode = 1;
        return;
      }
      logger.success(`📝 Summary of ${filename}:`);
      logger.info(result.summary);
    })
  );

const sessions = program.command('sessions').description('Manage chat sessions');

sessions
  .command('list')
  .description('List chat sessions, most recent first')
  .action(() =>
    withContainer(async (container) => {
      const all = await container.chatStore.listSessions();
      if (all.length === 0) {
        logger.info('📭 No chat sessions yet');
        return;
      }
      all.forEach((session) => {
        logger.info(
          `  #${session.id} ${session.name} (${session.messageCount} messages, updated ${session.updatedAt.toISOString()})`
        );
      });
    })
  );

sessions
  .command('show')
  .argument('<id>', 'session id', parsePositiveInteger)
  .description('Print the messages of a chat session')
  .action((id: number) =>
    withContainer(async (container) => {
      const session = await container.chatStore.getSession(id);
      if (!session) {
        throw new ValidationError(`Chat session ${id} does not exist`);
      }

      logger.info(`💬 #${session.id} ${session.name}`);
      session.messages.forEach((message) => {
        if (message.role === 'user') {
          logger.question(`Q: ${message.content}`);
        } else {
          logger.success(`A: ${message.content}`);
        }
      });
    })
  );

sessions
  .command('rename')
  .argument('<id>', 'session id', parsePositiveInteger)
  .argument('<name>', 'new session name')
  .description('Rename a chat session')
  .action((id: number, name: string) =>
    withContainer(async (container) => {
      if (!name.trim()) {
        throw new ValidationError('Session name must not be empty');
      }
      if (!(await container.chatStore.renameSession(id, name.trim()))) {
        throw new ValidationError(`Chat session ${id} does not exist`);
      }
      logger.success(`✅ Renamed session #${id}`);
    })
  );

sessions
  .command('delete')
  .argument('<id>', 'session id', parsePositiveInteger)
  .description('Delete a chat session and its messages')
  .action((id: number) =>
    withContainer(async (container) => {
      if (!(await container.chatStore.deleteSession(id))) {
        throw new ValidationError(`Chat session ${id} does not exist`);
      }
      logger.success(`✅ Deleted session #${id}`);
    })
  );

program.parseAsync(process.argv).catch((error: unknown) => {
  if (isPromptExit(error)) return;
  logger.error(`❌ ${getErrorMessage(error)}`);
  process.exitCode = 1;
});
