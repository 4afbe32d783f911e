export type RawItem = { title: string; link: string; description?: string; publishedAt?: Date };

export type NewsItem = {
    title: string;
    description: string;
    link: string;
    source: string;
    publishDate: Date;
    score: number;
    translatedTitle?: string;
    translatedDescription?: string;
};

export type TrendTopic = string;

/**
 * 页面抽取规则
 * 每个候选列表按顺序尝试，取第一个有内容的元素（如 h3 → h2、摘要 → 首段）
 */
export type ExtractionRule = {
    item: string;
    title: string[];
    link: string[];
    description: string[];
    limit: number;
};

export type FeedSource = { kind: 'feed'; label: string; url: string; fallback?: SourceDescriptor };
export type PageSource = { kind: 'page'; label: string; url: string; origin?: string; rule: ExtractionRule; fallback?: SourceDescriptor };
export type SourceDescriptor = FeedSource | PageSource;

export type TrendStrategy = { selector: string; exclude: string[]; minLength: number };
export type TrendSource = { label: string; url: string; limit: number; strategies: TrendStrategy[] };

export type AggregationResult = {
    topItems: NewsItem[];
    trends: TrendTopic[];
    generatedAt: Date;
    /** 本次实际贡献条目的新闻源（按声明顺序） */
    newsSources: string[];
    /** 本次实际返回热点的热点源（按声明顺序） */
    trendSources: string[];
};
