// @vitest-environment jsdom

import { act, createRef } from "react";
import { createRoot, type Root } from "react-dom/client";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { PasteRuntimeProvider } from "@/components/paste/PasteRuntimeProvider";
import { PasteTextarea, type PasteTextareaHandle, type PasteTextareaProps } from "@/components/paste/PasteTextarea";
import type { PastePayload } from "@/paste/payload";
import { createPasteRuntime, type PasteRuntime } from "@/paste/runtime";
import { contentDto, FakePasteTransport, imageItemDto, textItemDto } from "@/test/fake-transport";

Reflect.set(globalThis, "IS_REACT_ACT_ENVIRONMENT", true);

describe("PasteTextarea", () => {
  let container: HTMLDivElement;
  let root: Root;
  let transport: FakePasteTransport;
  let runtime: PasteRuntime;
  let delivered: PastePayload[];

  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    container = document.createElement("div");
    document.body.append(container);
    root = createRoot(container);
    transport = new FakePasteTransport();
    runtime = createPasteRuntime({ platform: "macos", transport });
    delivered = [];
  });

  afterEach(() => {
    act(() => root.unmount());
    document.body.innerHTML = "";
    vi.restoreAllMocks();
  });

  function render(props: Partial<PasteTextareaProps> = {}, ref = createRef<PasteTextareaHandle>()) {
    act(() => {
      root.render(
        <PasteRuntimeProvider runtime={runtime}>
          <PasteTextarea ref={ref} onPastePayload={(payload) => delivered.push(payload)} {...props} />
        </PasteRuntimeProvider>,
      );
    });
    return ref;
  }

  function textarea(): HTMLTextAreaElement {
    const element = container.querySelector("textarea");
    if (!element) {
      throw new Error("textarea not rendered");
    }
    return element;
  }

  async function paste() {
    await act(async () => {
      textarea().dispatchEvent(new Event("paste", { bubbles: true, cancelable: true }));
      await runtime.channel.drain();
    });
  }

  it("registers a paste view for the textarea", () => {
    render();

    const viewId = Number(textarea().dataset.pasteViewId);
    expect(viewId).toBeGreaterThan(0);
    expect(textarea().dataset.pasteEnabled).toBe("true");
    expect(runtime.channel.isViewRegistered(viewId)).toBe(true);
  });

  it("delivers classified clipboard content on paste", async () => {
    transport.clipboard = contentDto(textItemDto("caption"), imageItemDto([1, 2]));
    render();

    await paste();

    expect(delivered).toHaveLength(1);
    expect(delivered[0].kind).toBe("image");
  });

  it("applies accepted types from props", async () => {
    transport.clipboard = contentDto(imageItemDto([1]));
    render({ acceptedTypes: ["text"] });

    await paste();
    expect(delivered).toEqual([]);

    render({ acceptedTypes: null });
    await paste();
    expect(delivered.map((payload) => payload.kind)).toEqual(["image"]);
  });

  it("follows the enabled prop", async () => {
    transport.clipboard = contentDto(textItemDto("toggle"));
    render({ pasteEnabled: false });

    expect(textarea().dataset.pasteEnabled).toBe("false");
    await paste();
    expect(delivered).toEqual([]);

    render({ pasteEnabled: true });
    await paste();
    expect(delivered).toEqual([{ kind: "text", text: "toggle" }]);
  });

  it("pastes from the menu into the textarea", async () => {
    transport.clipboard = contentDto(textItemDto("menu"));
    const ref = render();

    await act(async () => {
      await ref.current?.pasteFromMenu();
    });

    expect(textarea().value).toBe("menu");
    expect(delivered).toEqual([{ kind: "text", text: "menu" }]);
  });

  it("releases its view and the channel on unmount", () => {
    render();
    const viewId = Number(textarea().dataset.pasteViewId);

    act(() => root.render(<div />));

    expect(runtime.channel.isViewRegistered(viewId)).toBe(false);
    expect(runtime.channel.initialized).toBe(false);
  });
});
