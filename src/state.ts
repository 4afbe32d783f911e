export type SourceStatus = {
    label: string;
    kind: 'news' | 'trends';
    count: number;
    /** 命中的 URL（新闻源回退链中实际生效的一环） */
    via?: string;
    lastError?: string;
};

/**
 * 单次运行的源状态表
 * 每次运行新建、结束即丢弃；仅由流水线在并行抓取汇合后顺序写入
 * Map 保持插入顺序，即源的声明顺序
 */
export type RunState = { sourceStatus: Map<string, SourceStatus> };

export function createRunState(): RunState {
    return { sourceStatus: new Map<string, SourceStatus>() };
}

// 同名源（如同一站点的多个频道）累加条数
export function setSourceStatus(state: RunState, partial: SourceStatus) {
    const key = `${partial.kind}:${partial.label}`;
    const prev = state.sourceStatus.get(key);
    const next: SourceStatus = prev
        ? { ...prev, count: prev.count + partial.count, via: partial.via ?? prev.via, lastError: partial.lastError ?? prev.lastError }
        : partial;
    state.sourceStatus.set(key, next);
}

export function contributors(state: RunState, kind: SourceStatus['kind']): string[] {
    return [...state.sourceStatus.values()].filter((s) => s.kind === kind && s.count > 0).map((s) => s.label);
}
