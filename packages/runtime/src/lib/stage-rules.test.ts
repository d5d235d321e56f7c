import { STAGE_RULES, nextStage, stageIndex } from './stage-rules.js';

describe('stage rules', () => {
  it('should declare the required fields per stage', () => {
    expect(STAGE_RULES.introduction.requiredFields).toEqual(['name', 'company']);
    expect(STAGE_RULES.needs_identification.requiredFields).toEqual(['need', 'pain_point']);
    expect(STAGE_RULES.qualification.requiredFields).toEqual(['budget', 'timeline']);
    expect(STAGE_RULES.proposal.requiredFields).toEqual(['product_interest']);
    expect(STAGE_RULES.closing.requiredFields).toEqual([]);
  });

  it('should use the stage name as template id', () => {
    expect(STAGE_RULES.qualification.templateId).toBe('qualification');
  });

  it('should walk the stages in order', () => {
    expect(nextStage('introduction')).toBe('needs_identification');
    expect(nextStage('needs_identification')).toBe('qualification');
    expect(nextStage('qualification')).toBe('proposal');
    expect(nextStage('proposal')).toBe('closing');
  });

  it('should have no stage after closing or ended', () => {
    expect(nextStage('closing')).toBeNull();
    expect(nextStage('ended')).toBeNull();
  });

  it('should order ended after every active stage', () => {
    expect(stageIndex('introduction')).toBe(0);
    expect(stageIndex('closing')).toBe(4);
    expect(stageIndex('ended')).toBe(5);
  });
});
