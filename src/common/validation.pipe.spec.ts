import { ArgumentMetadata } from '@nestjs/common';
import { OptimizeContentDto } from '../dto/optimize.dto';
import { createValidationPipe } from './validation.pipe';

const metadata: ArgumentMetadata = { type: 'body', metatype: OptimizeContentDto };

const validBody = {
  html_code: '<p>Body</p>',
  focus_keyword: 'testing',
  seo_score: 40,
};

describe('createValidationPipe', () => {
  const pipe = createValidationPipe();

  it.each([
    [{}, 'Missing required field: html_code'],
    [{ focus_keyword: 'testing' }, 'Missing required field: html_code'],
    [{ html_code: '<p>Body</p>', seo_score: 10 }, 'Missing required field: focus_keyword'],
    [{ ...validBody, focus_keyword: '   ' }, 'Missing required field: focus_keyword'],
    [{ html_code: '<p>Body</p>', focus_keyword: 'testing' }, 'Missing required field: seo_score'],
  ])('rejects %j as missing', async (body, message) => {
    await expect(pipe.transform(body, metadata)).rejects.toThrow(message);
  });

  it.each([
    [{ ...validBody, seo_score: 150 }, 'Invalid value for field: seo_score'],
    [{ ...validBody, seo_score: 'high' }, 'Invalid value for field: seo_score'],
    [{ ...validBody, seo_score: true }, 'Invalid value for field: seo_score'],
    [{ ...validBody, html_code: 123 }, 'Invalid value for field: html_code'],
    [{ ...validBody, focus_keyword: 123 }, 'Invalid value for field: focus_keyword'],
    [{ ...validBody, focus_keyword: '!!!' }, 'Invalid value for field: focus_keyword'],
    [{ ...validBody, schema: 'Recipe' }, 'Invalid value for field: schema'],
    [{ ...validBody, tags: ['soup', 7] }, 'Invalid value for field: tags'],
  ])('rejects %j as invalid', async (body, message) => {
    await expect(pipe.transform(body, metadata)).rejects.toThrow(message);
  });

  it('converts and strips the request body', async () => {
    const dto = await pipe.transform(
      { ...validBody, focus_keyword: '  testing  ', seo_score: '70', unknown: true },
      metadata,
    );

    expect(dto).toBeInstanceOf(OptimizeContentDto);
    expect(dto).toEqual({ html_code: '<p>Body</p>', focus_keyword: 'testing', seo_score: 70 });
  });
});
