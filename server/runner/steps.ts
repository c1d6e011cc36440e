import type { RetryPolicy, StepDescriptor } from './types.js';

const SINGLE_ATTEMPT: RetryPolicy = { maxAttempts: 1, delayMs: 0 };

function step(name: string, label: string, retry: RetryPolicy = SINGLE_ATTEMPT): StepDescriptor {
  return { name, label, action: { name }, retry: { ...retry } };
}

/**
 * The fixed per-profile task sequence, in execution order. Each step's action
 * name is looked up in the driver's action registry.
 */
export function createDefaultSteps(): StepDescriptor[] {
  return [
    step('verify-login', 'Verify login'),
    step('check-feed', 'Check feed access', { maxAttempts: 2, delayMs: 2000 }),
    step('visit-author-profile', "Visit first post author's profile"),
    step('react-to-story', 'Watch and react to first story'),
    step('like-post', 'Like first post'),
    step('comment-post', 'Comment on first post'),
    step('create-image-post', 'Create an image post'),
  ];
}

export function describeSteps(steps: StepDescriptor[]): Array<Pick<StepDescriptor, 'name' | 'label'>> {
  return steps.map(({ name, label }) => ({ name, label }));
}
