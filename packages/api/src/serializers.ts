import type {
  BlogPost,
  Campaign,
  ContentRewrite,
  ExpandResult,
  Newsletter,
  RewriteResult,
  ScoreResult,
  ShortenResult,
  SocialPost,
} from '@quill/shared';

// ─── Wire format (snake_case) ───

export function serializeScore(r: ScoreResult) {
  return {
    hook_score: r.hookScore,
    structure_score: r.structureScore,
    niche_score: r.nicheScore,
    overall_score: r.overallScore,
    predicted_engagement: r.predictedEngagement,
    recommendations: r.recommendations,
  };
}

export function serializeRewrite(r: RewriteResult) {
  return {
    original_text: r.originalText,
    rewritten_text: r.rewrittenText,
    original_score: r.originalScore,
    improved_score: r.improvedScore,
    improvements: r.improvements,
  };
}

export function serializeBlog(post: BlogPost) {
  return {
    title: post.title,
    content: post.content,
    word_count: post.wordCount,
    metadata: { style: post.metadata.style, generated_by: post.metadata.generatedBy },
  };
}

export function serializeNewsletter(n: Newsletter) {
  return {
    subject: n.subject,
    preview_text: n.previewText,
    sections: n.sections,
    cta: n.cta,
    word_count: n.wordCount,
  };
}

export function serializePosts(posts: SocialPost[]) {
  return {
    posts: posts.map((p) => ({
      platform: p.platform,
      content: p.content,
      character_count: p.characterCount,
      hashtags: p.hashtags,
    })),
  };
}

export function serializeCampaign(c: Campaign) {
  return {
    goal: c.goal,
    audience: c.audience,
    steps: c.steps.map((s) => ({
      step_number: s.stepNumber,
      subject: s.subject,
      content: s.content,
      delay_days: s.delayDays,
    })),
    total_duration_days: c.totalDurationDays,
  };
}

export function serializeExpand(r: ExpandResult) {
  return { original_length: r.originalLength, expanded_length: r.expandedLength, content: r.content };
}

export function serializeShorten(r: ShortenResult) {
  return { original_length: r.originalLength, shortened_length: r.shortenedLength, content: r.content };
}

export function serializeContentRewrite(r: ContentRewrite) {
  return { original: r.original, rewritten: r.rewritten };
}
