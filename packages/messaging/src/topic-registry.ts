import type { AgentId } from '@parley/core';

/** Topic name → subscribed agents, in subscription order. */
export class TopicRegistry {
  private readonly topicMap = new Map<string, Set<AgentId>>();

  /** Returns false when the agent was already subscribed. */
  subscribe(agentId: AgentId, topic: string): boolean {
    let members = this.topicMap.get(topic);
    if (!members) {
      members = new Set();
      this.topicMap.set(topic, members);
    }
    if (members.has(agentId)) return false;
    members.add(agentId);
    return true;
  }

  /** Returns whether the membership existed. */
  unsubscribe(agentId: AgentId, topic: string): boolean {
    const members = this.topicMap.get(topic);
    if (!members?.delete(agentId)) return false;
    if (members.size === 0) this.topicMap.delete(topic);
    return true;
  }

  subscribers(topic: string): AgentId[] {
    return [...(this.topicMap.get(topic) ?? [])];
  }

  topicsOf(agentId: AgentId): string[] {
    const topics: string[] = [];
    for (const [topic, members] of this.topicMap) {
      if (members.has(agentId)) topics.push(topic);
    }
    return topics;
  }

  /** Drop every membership of an agent. */
  removeAgent(agentId: AgentId): void {
    for (const topic of this.topicsOf(agentId)) {
      this.unsubscribe(agentId, topic);
    }
  }

  topics(): string[] {
    return [...this.topicMap.keys()];
  }
}
