import * as fs from 'node:fs';
import * as path from 'node:path';
import { DocumentManager } from './document-manager';
import { DEFAULT_MAX_FILE_BYTES, isSupportedFile, loadFile, SUPPORTED_EXTENSIONS } from './file-loader';
import { ValidationError, getErrorMessage } from '../errors';
import { logger } from '../utils/logger';

export interface IngestResult {
  processed: number;
  skipped: number;
}

export class IngestHandler {
  constructor(
    private readonly documents: DocumentManager,
    private readonly maxFileBytes: number = DEFAULT_MAX_FILE_BYTES
  ) {}

  private isDirectory(pathName: string): boolean {
    return fs.statSync(pathName).isDirectory();
  }

  private getAllSupportedFiles(dirPath: string): string[] {
    const files: string[] = [];

    const processDirectory = (currentPath: string) => {
      const items = fs.readdirSync(currentPath).sort();

      for (const item of items) {
        const fullPath = path.join(currentPath, item);
        const stats = fs.statSync(fullPath);

        if (stats.isDirectory()) {
          processDirectory(fullPath);
        } else if (isSupportedFile(fullPath)) {
          files.push(fullPath);
        }
      }
    };

    processDirectory(dirPath);
    return files;
  }

  /**
   * Ingest a single file or every supported file under a directory. A file
   * that fails is logged and skipped; the run only fails when none succeed.
   */
  public async run(pathName: string): Promise<IngestResult> {
    const normalizedPath = path.normalize(pathName.trim());
    if (!pathName.trim() || !fs.existsSync(normalizedPath)) {
      throw new ValidationError(`Path does not exist: ${normalizedPath}`);
    }

    let filesToProcess: string[];

    if (this.isDirectory(normalizedPath)) {
      logger.info(`📁 Processing directory: ${normalizedPath}`);
      filesToProcess = this.getAllSupportedFiles(normalizedPath);

      if (filesToProcess.length === 0) {
        throw new ValidationError(
          `No supported files (${SUPPORTED_EXTENSIONS.join(', ')}) found in directory: ${normalizedPath}`
        );
      }

      logger.info(`📄 Found ${filesToProcess.length} files:`);
      filesToProcess.forEach((file) => logger.info(`  - ${path.relative(normalizedPath, file)}`));
    } else {
      filesToProcess = [normalizedPath];
      logger.info(`📄 Processing single file: ${normalizedPath}`);
    }

    let processed = 0;
    let skipped = 0;
    // Documents are keyed by base name; a second file with the same name would replace the first.
    const seen = new Map<string, string>();

    for (const filePath of filesToProcess) {
      const filename = path.basename(filePath);
      logger.info(`🔄 Processing: ${filename}`);

      const earlier = seen.get(filename);
      if (earlier !== undefined) {
        logger.warning(`⚠️  Skipping ${filePath}: ${filename} was already ingested from ${earlier} in this run`);
        skipped++;
        continue;
      }

      try {
        const file = await loadFile(filePath, this.maxFileBytes);
        await this.documents.ingest(file.text, file.filename, { ...file.metadata });
        seen.set(filename, filePath);
        processed++;
      } catch (error) {
        logger.error(`❌ Error processing ${filename}: ${getErrorMessage(error)}`);
        skipped++;
      }
    }

    if (processed === 0) {
      throw new ValidationError('No files were successfully processed');
    }

    logger.success('🎉 Processing complete:');
    logger.success(`   ✅ Successfully processed: ${processed} files`);
    if (skipped > 0) {
      logger.warning(`   ⚠️  Skipped: ${skipped} files`);
    }

    return { processed, skipped };
  }
}
