import juice from 'juice';
import { JuiceStyleInliner, StyleInliner, StyleInlineError, inlineStylesOrOriginal } from '../style-inliner';
import { ManualClock } from '../../__tests__/test-utils';

describe('JuiceStyleInliner', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should move embedded stylesheet rules onto the elements', async () => {
    const inliner = new JuiceStyleInliner();

    const html = await inliner.inline('<html><head><style>p { color: red; }</style></head><body><p>Hi</p></body></html>');

    expect(html).toContain('<p style="color: red;">Hi</p>');
  });

  it('should reject when the stylesheet fetch does not finish in time', async () => {
    jest.spyOn(juice, 'juiceResources').mockImplementation(() => undefined);
    const clock = new ManualClock();
    const inliner = new JuiceStyleInliner({ timeoutMs: 500 }, clock);

    const assertion = expect(inliner.inline('<p>x</p>')).rejects.toThrow('Stylesheet fetch timed out after 500ms');
    await clock.advance(500);
    await assertion;
  });

  it('should wrap errors from juice', async () => {
    jest.spyOn(juice, 'juiceResources').mockImplementation((_html, _options, callback) => {
      callback(new Error('404 Not Found'), '');
    });
    const inliner = new JuiceStyleInliner({}, new ManualClock());

    await expect(inliner.inline('<p>x</p>')).rejects.toThrow(StyleInlineError);
    await expect(inliner.inline('<p>x</p>')).rejects.toThrow('Style inlining failed: 404 Not Found');
  });
});

describe('inlineStylesOrOriginal', () => {
  it('should return the original markup when inlining fails', async () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const failing: StyleInliner = {
      inline: async () => {
        throw new StyleInlineError('Stylesheet fetch timed out after 10000ms');
      }
    };

    await expect(inlineStylesOrOriginal(failing, '<p>keep me</p>')).resolves.toBe('<p>keep me</p>');
    expect(warn).toHaveBeenCalledWith(
      '[StyleInliner] Falling back to original markup: Stylesheet fetch timed out after 10000ms'
    );
    warn.mockRestore();
  });
});
