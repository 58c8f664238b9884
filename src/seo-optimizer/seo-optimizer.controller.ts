import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiBadRequestResponse, ApiOkResponse, ApiTags } from '@nestjs/swagger';
import { OptimizeContentDto, OptimizeResponse } from '../dto/optimize.dto';
import { OptimizationResult } from './optimization.interface';
import { SeoOptimizerService } from './seo-optimizer.service';

export function toOptimizeResponse(result: OptimizationResult): OptimizeResponse {
  return {
    success: true,
    data: {
      seo_score_before: result.scoreBefore,
      seo_score_after: result.scoreAfter,
      improvement: result.improvement,
      optimized_html_wordpress: result.rewrittenHtml,
      keyword_density: result.keywordDensity,
      title_length: result.titleLength,
      meta_length: result.metaLength,
      optimizations: [...result.optimizationsApplied],
    },
  };
}

@ApiTags('optimizer')
@Controller()
export class SeoOptimizerController {
  constructor(private readonly seoOptimizerService: SeoOptimizerService) {}

  @Post('optimize')
  @HttpCode(HttpStatus.OK)
  @ApiOkResponse({ type: OptimizeResponse })
  @ApiBadRequestResponse({ description: 'A required field is missing or invalid' })
  async optimize(@Body() dto: OptimizeContentDto): Promise<OptimizeResponse> {
    const result = await this.seoOptimizerService.optimize(dto);
    return toOptimizeResponse(result);
  }
}
