import { getTilefitterExtraCss, SKIP_WIDTH_CHECK_KEY, sessionWidthKey, setSessionWidth } from '@/lib/tileFitter';
import { NotFoundError } from '@/lib/errors';
import { fakeContext, type FakeContextOptions } from './helpers/fakeContext';

const HIDDEN = '.format-tiles.course-7.jsenabled:not(.editing) ul.tiles {opacity: 0;}';

function setup(overrides: FakeContextOptions = {}) {
  return fakeContext({
    config: { 'format_tiles/usejavascriptnav': '1', 'format_tiles/fittilestowidth': '1' },
    courses: [{ id: 7, fullname: 'Chemistry', contextId: 70, completionEnabled: false }],
    ...overrides,
  });
}

describe('tile fitter css', () => {
  it('hides the tiles until a width has been measured', async () => {
    expect(await getTilefitterExtraCss(setup(), 7)).toBe(HIDDEN);
  });

  it('applies the width reported for the course', async () => {
    const ctx = setup();
    await setSessionWidth(ctx, 7, 450);
    expect(ctx.session.get(sessionWidthKey(7))).toBe(450);
    expect(await getTilefitterExtraCss(ctx, 7)).toBe('.format-tiles.course-7.jsenabled ul.tiles {max-width: 450px;}');
    expect(await getTilefitterExtraCss(ctx, 7)).toBe('.format-tiles.course-7.jsenabled ul.tiles {max-width: 450px;}');
  });

  it('clears the width when zero is reported', async () => {
    const ctx = setup();
    await setSessionWidth(ctx, 7, 450);
    await setSessionWidth(ctx, 7, 0);
    expect(ctx.session.has(sessionWidthKey(7))).toBe(false);
    expect(await getTilefitterExtraCss(ctx, 7)).toBe(HIDDEN);
  });

  it('remembers skipcheck for the rest of the session', async () => {
    const ctx = setup({ params: 'skipcheck=1' });
    expect(await getTilefitterExtraCss(ctx, 7)).toBe('');
    expect(ctx.session.get(SKIP_WIDTH_CHECK_KEY)).toBe(1);
    const next = { ...ctx, params: new URLSearchParams() };
    expect(await getTilefitterExtraCss(next, 7)).toBe('');
  });

  it('ignores skipcheck=0', async () => {
    expect(await getTilefitterExtraCss(setup({ params: 'skipcheck=0' }), 7)).toBe(HIDDEN);
  });

  it('is empty when fitting or JS navigation is off', async () => {
    expect(await getTilefitterExtraCss(setup({ config: { 'format_tiles/usejavascriptnav': '1' } }), 7)).toBe('');
    expect(await getTilefitterExtraCss(setup({ config: { 'format_tiles/fittilestowidth': '1' } }), 7)).toBe('');
    expect(await getTilefitterExtraCss(setup({ preferences: { format_tiles_stopjsnav: '1' } }), 7)).toBe('');
    expect(await getTilefitterExtraCss(setup({ device: { legacyBrowser: true } }), 7)).toBe('');
  });

  it('is empty on phones but not on tablets', async () => {
    expect(await getTilefitterExtraCss(setup({ device: { type: 'mobile' } }), 7)).toBe('');
    expect(await getTilefitterExtraCss(setup({ device: { type: 'tablet' } }), 7)).toBe(HIDDEN);
  });

  it('rejects bad widths and unknown courses', async () => {
    await expect(setSessionWidth(setup(), 7, -5)).rejects.toBeInstanceOf(RangeError);
    await expect(setSessionWidth(setup(), 7, 12.5)).rejects.toBeInstanceOf(RangeError);
    await expect(setSessionWidth(setup(), 8, 450)).rejects.toBeInstanceOf(NotFoundError);
  });
});
