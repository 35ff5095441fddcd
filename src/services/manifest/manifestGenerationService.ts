import type { AppConfig } from '../../config/types.js';
import type { FilterThresholds, ProbedFile } from '../../types/media.js';
import type { Logger } from '../../utils/logger.js';
import { discoverVideoFiles } from '../scan/fileDiscoveryService.js';
import { evaluateFilter } from '../scan/filterPolicy.js';
import type { MetadataProbe } from '../media/ffprobeService.js';
import { buildManifest } from './manifestBuilder.js';
import { ManifestWriter } from './manifestWriter.js';

export interface GenerationOptions {
  rootDirectory: string;
  extensions: readonly string[];
  outputPath: string;
  baseUrl: string;
  thresholds: FilterThresholds;
}

export interface GenerationSummary {
  discovered: number;
  included: number;
  excluded: number;
  outputPath: string;
  durationMs: number;
}

export function generationOptionsFromConfig(config: AppConfig): GenerationOptions {
  return {
    rootDirectory: config.scan.directory,
    extensions: config.scan.extensions,
    outputPath: config.manifest.outputPath,
    baseUrl: config.manifest.baseUrl,
    thresholds: config.filter,
  };
}

/**
 * Manifest Generation Service
 *
 * One full pass: discover → probe → filter → classify/build → write.
 * Files are probed one at a time; nothing is carried over between passes.
 */
export class ManifestGenerationService {
  constructor(
    private readonly options: GenerationOptions,
    private readonly probe: MetadataProbe,
    private readonly writer: ManifestWriter,
    private readonly logger: Logger
  ) {}

  async generate(): Promise<GenerationSummary> {
    const startTime = Date.now();
    const { rootDirectory, extensions, outputPath, baseUrl, thresholds } = this.options;

    this.logger.info('Generating DeoVR JSON...');
    this.logger.debug(`Directory: ${rootDirectory}`);
    this.logger.debug(`Extensions: ${extensions.join(', ')}`);

    const files = await discoverVideoFiles(rootDirectory, extensions);
    for (const filePath of files) {
      this.logger.debug(`+ ${filePath}`);
    }

    const included: ProbedFile[] = [];
    for (const filePath of files) {
      const metrics = await this.probe.probe(filePath);
      const decision = evaluateFilter(metrics, thresholds);

      if (decision.excluded) {
        this.logger.debug(`- ${filePath}`, {
          ...metrics,
          reasons: decision.reasons,
        });
        continue;
      }

      included.push({ filePath, metrics });
    }

    const manifest = buildManifest(included, { rootDirectory, baseUrl });
    await this.writer.write(manifest, outputPath);

    const summary: GenerationSummary = {
      discovered: files.length,
      included: included.length,
      excluded: files.length - included.length,
      outputPath,
      durationMs: Date.now() - startTime,
    };

    this.logger.info('DeoVR JSON generated successfully!', summary);
    return summary;
  }
}
