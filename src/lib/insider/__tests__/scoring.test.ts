import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { normalizeName } from '../name-variants';
import {
  DEFAULT_SCORING_WEIGHTS,
  MATCH_THRESHOLD,
  isMatch,
  scoreBreakdown,
  scoreCandidate,
} from '../scoring';
import type { NameVariant } from '../types';

const klappa = normalizeName('Gale Klappa');

function assertClose(actual: number, expected: number) {
  assert.ok(Math.abs(actual - expected) < 1e-9, `expected ${expected}, got ${actual}`);
}

describe('scoreCandidate', () => {
  it('scores an exact filing form as 1.0', () => {
    assert.equal(scoreCandidate(klappa, 'KLAPPA GALE'), 1);
    assert.equal(scoreCandidate(klappa, 'Klappa, Gale'), 1);
  });

  it('scores a full token overlap with an extra initial at the overlap ceiling', () => {
    assert.deepEqual(scoreBreakdown(klappa, 'KLAPPA GALE E'), {
      exact: 0,
      tokenOverlap: 0.9,
      containment: 0,
      editDistance: 0,
      total: 0.9,
      variant: 'Gale Klappa',
    });
  });

  it('drops generational suffixes from the filer name', () => {
    assert.equal(scoreCandidate(klappa, 'KLAPPA GALE E JR'), 0.9);
    assert.equal(scoreCandidate(normalizeName('Gale Klappa Jr.'), 'KLAPPA GALE JR'), 1);
    assert.equal(scoreCandidate(normalizeName('Bill Gates'), 'GATES WILLIAM H III'), 0.9);
  });

  it('accepts a spelled-out middle name', () => {
    const breakdown = scoreBreakdown(klappa, 'KLAPPA GALE EDWARD');
    assertClose(breakdown.tokenOverlap, 0.6);
    assert.equal(breakdown.containment, 0.85);
    assert.equal(breakdown.total, 0.85);
    assert.equal(breakdown.variant, 'Gale Klappa');
    assert.ok(isMatch(breakdown.total));
  });

  it('does not treat two extra names as a middle name', () => {
    const breakdown = scoreBreakdown(klappa, 'KLAPPA GALE EDWARD JOSEPH');
    assert.equal(breakdown.containment, 0);
    assert.equal(isMatch(breakdown.total), false);
  });

  it('uses edit distance for a misspelled surname', () => {
    const breakdown = scoreBreakdown(klappa, 'Klapa Gale');
    assertClose(breakdown.tokenOverlap, 0.3);
    assertClose(breakdown.editDistance, (11 / 12) * 0.85);
    assertClose(breakdown.total, (11 / 12) * 0.85);
    assert.ok(isMatch(breakdown.total));
  });

  it('ignores edit similarity below the floor', () => {
    const breakdown = scoreBreakdown(klappa, 'Bob Klappa');
    assertClose(breakdown.tokenOverlap, 0.3);
    assert.equal(breakdown.editDistance, 0);
    assert.equal(isMatch(breakdown.total), false);
  });

  it('folds nicknames when comparing tokens', () => {
    const robert: NameVariant[] = [{ form: 'Robert Smith', kind: 'first_last', tokens: ['robert', 'smith'] }];
    assertClose(scoreCandidate(robert, 'SMITH BOBBY'), 0.9);
  });

  it('is symmetric under token reordering', () => {
    const orders = ['Klappa Gale E', 'Gale E Klappa', 'E Klappa Gale', 'Gale Klappa E'];
    const scores = orders.map((name) => scoreBreakdown(klappa, name));
    for (const score of scores) {
      assert.equal(score.total, scores[0].total);
      assert.equal(score.tokenOverlap, scores[0].tokenOverlap);
    }

    assert.equal(scoreCandidate(klappa, 'Gale Klapa'), scoreCandidate(klappa, 'Klapa Gale'));
  });

  it('returns 0 for an empty candidate', () => {
    assert.deepEqual(scoreBreakdown(klappa, '  '), {
      exact: 0,
      tokenOverlap: 0,
      containment: 0,
      editDistance: 0,
      total: 0,
      variant: null,
    });
  });

  it('scores an unrelated name below the threshold', () => {
    assert.equal(scoreCandidate(klappa, 'SMITH JOHN'), 0);
  });

  it('applies custom weights', () => {
    const weights = { ...DEFAULT_SCORING_WEIGHTS, tokenOverlap: 0.5 };
    assert.equal(scoreCandidate(klappa, 'KLAPPA GALE E', weights), 0.5);
  });
});

describe('isMatch', () => {
  it('compares against the module threshold by default', () => {
    assert.equal(MATCH_THRESHOLD, 0.75);
    assert.equal(isMatch(0.75), true);
    assert.equal(isMatch(0.7499), false);
    assert.equal(isMatch(0.7, 0.6), true);
  });
});
