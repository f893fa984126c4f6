import {ErrorKind} from '../../src/utils/handle-error';
import {parse_waitlist_submission} from '../../src/validators/waitlist.validator';

describe('parse_waitlist_submission', () => {
  it('keeps the optional fields when given', () => {
    expect(
      parse_waitlist_submission({
        email: ' Foo@Example.com ',
        token: 'tok',
        city: 'Roma',
        source: 'ads',
      })
    ).toEqual({
      email: 'Foo@Example.com',
      token: 'tok',
      city: 'Roma',
      source: 'ads',
    });
  });

  it('leaves null optional fields out', () => {
    expect(
      parse_waitlist_submission({email: 'a@b.com', token: 'tok', city: null})
    ).toEqual({email: 'a@b.com', token: 'tok'});
  });

  it.each([
    [null, 'Request body must be an object'],
    [['a@b.com'], 'Request body must be an object'],
    [{token: 'tok'}, 'Please provide a valid email address'],
    [{email: 'a@b', token: 'tok'}, 'Please provide a valid email address'],
    [{email: 42, token: 'tok'}, 'Please provide a valid email address'],
    [{email: 'a@b.com', token: ''}, 'Please provide a captcha token'],
    [{email: 'a@b.com', token: 7}, 'Please provide a captcha token'],
    [{email: 'a@b.com', token: 'tok', source: 3}, 'source must be a string'],
  ])('rejects %j', (body, message) => {
    expect(() => parse_waitlist_submission(body)).toThrow(message);
  });

  it('raises validation errors', () => {
    let caught: unknown;
    try {
      parse_waitlist_submission({});
    } catch (error) {
      caught = error;
    }

    expect(caught).toMatchObject({kind: ErrorKind.Validation, status: 400});
  });
});
