type TextField = HTMLInputElement | HTMLTextAreaElement;

function isTextField(element: Element): element is TextField {
  return element instanceof HTMLTextAreaElement || element instanceof HTMLInputElement;
}

// 绕过 React 受控组件的 value tracker，否则 onChange 不会触发
function setNativeValue(element: TextField, value: string): void {
  const prototype = element instanceof HTMLTextAreaElement ? HTMLTextAreaElement.prototype : HTMLInputElement.prototype;
  const setter = Object.getOwnPropertyDescriptor(prototype, "value")?.set;
  if (setter) {
    setter.call(element, value);
    return;
  }
  element.value = value;
}

export function insertTextAtSelection(element: HTMLElement | null, text: string): boolean {
  if (!element || !isTextField(element) || element.readOnly || element.disabled) {
    return false;
  }

  // number/email 等类型不支持选区
  const start = element.selectionStart;
  const end = element.selectionEnd;
  if (start === null || end === null) {
    return false;
  }

  const value = element.value;
  const insertStart = start >= 0 ? Math.min(start, value.length) : value.length;
  const insertEnd = end >= insertStart ? Math.min(end, value.length) : insertStart;

  setNativeValue(element, `${value.slice(0, insertStart)}${text}${value.slice(insertEnd)}`);
  const cursor = insertStart + text.length;
  element.setSelectionRange(cursor, cursor);
  element.dispatchEvent(new Event("input", { bubbles: true }));
  return true;
}
