export interface EventGuard {
  claim: (event: Event) => boolean;
}

// 同一个 DOM 事件冒泡或被重复派发时只计一次粘贴
export function createEventGuard(): EventGuard {
  const handled = new WeakSet<Event>();
  return {
    claim(event) {
      if (handled.has(event)) {
        return false;
      }
      handled.add(event);
      return true;
    },
  };
}
