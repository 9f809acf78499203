import { BadRequestException } from '@nestjs/common';
import { extractActorId } from './actor-id.decorator';

describe('extractActorId', () => {
  it('should return the trimmed header value', () => {
    expect(extractActorId({ headers: { 'x-actor-id': ' reviewer-1 ' } })).toBe(
      'reviewer-1',
    );
  });

  it('should take the first value of a repeated header', () => {
    expect(
      extractActorId({ headers: { 'x-actor-id': ['reviewer-1', 'reviewer-2'] } }),
    ).toBe('reviewer-1');
  });

  it('should reject a missing or blank header', () => {
    expect(() => extractActorId({ headers: {} })).toThrow(BadRequestException);
    expect(() => extractActorId({ headers: { 'x-actor-id': '  ' } })).toThrow(
      'Missing x-actor-id header',
    );
  });
});
