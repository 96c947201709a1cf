import { pgEnum } from 'drizzle-orm/pg-core';
import { STORY_STATUSES } from '../../types/story.js';

// -----------------------------------------------------------------------------
// Enumerated types
// -----------------------------------------------------------------------------

export const storyStatusEnum = pgEnum('story_status', STORY_STATUSES);
