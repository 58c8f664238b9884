import { Inject, Injectable, Logger } from '@nestjs/common';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { ConfigType } from '@nestjs/config';
import { Cache } from 'cache-manager';
import { createHash } from 'crypto';
import { optimizerConfig } from '../config/config';
import { OptimizeContentDto } from '../dto/optimize.dto';
import { optimizeHtml } from './html-optimizer';
import { OptimizationRequest, OptimizationResult } from './optimization.interface';
import { OptimizationFailedException } from './optimization-failed.exception';
import { DEFAULT_CATEGORIES, DEFAULT_SCHEMA_TYPE } from './seo-optimizer.constants';

const cleanList = (values: string[] | undefined) =>
  (values ?? []).map((value) => value.trim()).filter(Boolean);

@Injectable()
export class SeoOptimizerService {
  private readonly logger = new Logger(SeoOptimizerService.name);

  constructor(
    @Inject(CACHE_MANAGER) private readonly cacheManager: Cache,
    @Inject(optimizerConfig.KEY)
    private readonly config: ConfigType<typeof optimizerConfig>,
  ) {}

  toRequest(dto: OptimizeContentDto): OptimizationRequest {
    const categories = cleanList(dto.categories);
    return {
      htmlFragment: dto.html_code,
      focusKeyword: dto.focus_keyword,
      priorScore: dto.seo_score,
      categories: categories.length > 0 ? categories : DEFAULT_CATEGORIES,
      tags: cleanList(dto.tags),
      image: dto.image?.trim() || undefined,
      schemaType: dto.schema ?? DEFAULT_SCHEMA_TYPE,
    };
  }

  async optimize(dto: OptimizeContentDto): Promise<OptimizationResult> {
    const request = this.toRequest(dto);
    const cacheKey = `optimize_${createHash('sha256').update(JSON.stringify(request)).digest('hex')}`;

    const cached = await this.cacheManager.get<OptimizationResult>(cacheKey);
    if (cached) {
      this.logger.debug(`Returning cached optimization for "${request.focusKeyword}"`);
      return cached;
    }

    let result: OptimizationResult;
    try {
      result = optimizeHtml(request, this.config);
    } catch (error) {
      this.logger.error(
        `Optimization failed for "${request.focusKeyword}": ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new OptimizationFailedException();
    }

    this.logger.log(
      `Optimized content for "${request.focusKeyword}": score ${result.scoreBefore} -> ${result.scoreAfter}, ` +
        `${result.optimizationsApplied.length} optimizations applied`,
    );
    await this.cacheManager.set(cacheKey, result, this.config.cacheTtl);
    return result;
  }
}
