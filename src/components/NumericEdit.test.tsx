import { describe, it, expect, vi } from "vitest";
import { render, screen, fireEvent, act } from "@testing-library/react";
import type { NumericEditBridge } from "@/lib/bridge";
import { Decimal } from "@/lib/numeric/decimal";
import { numericTypes } from "@/lib/numeric/kinds";
import { NumericEdit } from "./NumericEdit";

function fakeBridge() {
  return {
    initialize: vi.fn<NumericEditBridge["initialize"]>(),
    update: vi.fn<NonNullable<NumericEditBridge["update"]>>(),
    destroy: vi.fn<NumericEditBridge["destroy"]>(),
    releaseHandle: vi.fn<NumericEditBridge["releaseHandle"]>(),
  };
}

const PRICE = Decimal.from("2.50");

describe("NumericEdit", () => {
  it("shows the formatted value", () => {
    render(<NumericEdit numericType={numericTypes.decimal} value={PRICE} />);
    expect(screen.getByRole("textbox")).toHaveValue("2.50");
  });

  it("shows an empty input for an unset value", () => {
    render(<NumericEdit numericType={numericTypes.int32} value={null} placeholder="Quantity" />);
    expect(screen.getByPlaceholderText("Quantity")).toHaveValue("");
  });

  it("commits typed text through the DOM bridge", () => {
    const onValueChange = vi.fn();
    render(<NumericEdit numericType={numericTypes.int32} value={7} onValueChange={onValueChange} />);

    fireEvent.change(screen.getByRole("textbox"), { target: { value: "12" } });

    expect(onValueChange).toHaveBeenCalledTimes(1);
    expect(onValueChange).toHaveBeenCalledWith(12);
  });

  it("keeps the value on unparsable text and restores it on blur", () => {
    const onValueChange = vi.fn();
    render(<NumericEdit numericType={numericTypes.int32} value={7} onValueChange={onValueChange} />);
    const input = screen.getByRole("textbox");

    fireEvent.change(input, { target: { value: "abc" } });
    expect(onValueChange).not.toHaveBeenCalled();
    expect(input).toHaveValue("abc");

    fireEvent.blur(input);
    expect(input).toHaveValue("7");
  });

  it("keeps committing typed text after the spinner is toggled", () => {
    const onValueChange = vi.fn();
    const { rerender } = render(<NumericEdit numericType={numericTypes.int32} value={7} onValueChange={onValueChange} />);

    rerender(<NumericEdit numericType={numericTypes.int32} value={7} showSpinner onValueChange={onValueChange} />);
    fireEvent.change(screen.getByRole("textbox"), { target: { value: "12" } });

    expect(onValueChange).toHaveBeenCalledTimes(1);
    expect(onValueChange).toHaveBeenCalledWith(12);
  });

  it("moves the bridge to the new input when the spinner is toggled", () => {
    const bridge = fakeBridge();
    const { rerender } = render(<NumericEdit id="qty" numericType={numericTypes.int32} value={7} bridge={bridge} />);
    const first = screen.getByRole("textbox");

    rerender(<NumericEdit id="qty" numericType={numericTypes.int32} value={7} showSpinner bridge={bridge} />);
    const second = screen.getByRole("textbox");

    expect(second).not.toBe(first);
    expect(bridge.destroy).toHaveBeenCalledWith(first, "qty");
    expect(bridge.initialize).toHaveBeenCalledTimes(2);
    expect(bridge.initialize.mock.calls[1][1]).toBe(second);
  });

  it("does not push equal inline bounds to the bridge again", () => {
    const bridge = fakeBridge();
    const { rerender } = render(
      <NumericEdit numericType={numericTypes.decimal} value={PRICE} min={Decimal.from("0")} bridge={bridge} />,
    );

    rerender(<NumericEdit numericType={numericTypes.decimal} value={PRICE} min={Decimal.from("0")} bridge={bridge} />);

    expect(bridge.update).not.toHaveBeenCalled();
  });

  it("steps with the spinner buttons", () => {
    const onValueChange = vi.fn();
    render(<NumericEdit numericType={numericTypes.int32} value={5} showSpinner onValueChange={onValueChange} />);

    fireEvent.click(screen.getByRole("button", { name: "Increase value" }));

    expect(onValueChange).toHaveBeenCalledWith(6);
    expect(screen.getByRole("textbox")).toHaveValue("6");
  });

  it("does not step past the maximum", () => {
    const onValueChange = vi.fn();
    render(<NumericEdit numericType={numericTypes.int32} value={5} max={5} showSpinner onValueChange={onValueChange} />);

    fireEvent.click(screen.getByRole("button", { name: "Increase value" }));

    expect(onValueChange).not.toHaveBeenCalled();
    expect(screen.getByRole("textbox")).toHaveValue("5");
  });

  it("steps with the arrow keys", () => {
    const onValueChange = vi.fn();
    render(<NumericEdit numericType={numericTypes.decimal} value={PRICE} step="0.25" onValueChange={onValueChange} />);

    fireEvent.keyDown(screen.getByRole("textbox"), { key: "ArrowDown" });

    expect(screen.getByRole("textbox")).toHaveValue("2.25");
  });

  it("disables the spinner when disabled", () => {
    render(<NumericEdit numericType={numericTypes.int32} value={5} showSpinner disabled />);

    expect(screen.getByRole("textbox")).toBeDisabled();
    expect(screen.getByRole("button", { name: "Increase value" })).toBeDisabled();
    expect(screen.getByRole("button", { name: "Decrease value" })).toBeDisabled();
  });

  it("maps visible characters to the size attribute", () => {
    render(<NumericEdit numericType={numericTypes.int32} value={5} visibleCharacters={8} />);
    expect(screen.getByRole("textbox")).toHaveAttribute("size", "8");
  });

  it("hands its settings to the bridge and releases it on unmount", () => {
    const bridge = fakeBridge();
    const { unmount } = render(
      <NumericEdit
        id="price"
        numericType={numericTypes.float64}
        value={1.5}
        decimals={3}
        decimalsSeparator=","
        step={0.5}
        min={0}
        bridge={bridge}
      />,
    );
    const input = screen.getByRole("textbox");

    expect(bridge.initialize).toHaveBeenCalledTimes(1);
    const [handle, element, elementId, options] = bridge.initialize.mock.calls[0];
    expect(element).toBe(input);
    expect(elementId).toBe("price");
    expect(options.decimals).toBe(3);
    expect(options.decimalsSeparator).toBe(",");
    expect(options.step.toString()).toBe("0.5");
    expect(options.min?.toString()).toBe("0");
    expect(options.max).toBeNull();

    unmount();

    expect(bridge.destroy).toHaveBeenCalledWith(input, "price");
    expect(bridge.releaseHandle).toHaveBeenCalledWith(handle);
  });

  it("accepts values reported by the bridge", () => {
    const bridge = fakeBridge();
    const onValueChange = vi.fn();
    render(
      <NumericEdit
        numericType={numericTypes.float64}
        value={1.5}
        decimalsSeparator=","
        bridge={bridge}
        onValueChange={onValueChange}
      />,
    );
    const [handle] = bridge.initialize.mock.calls[0];

    act(() => {
      handle.setValue("4,5");
    });

    expect(onValueChange).toHaveBeenCalledWith(4.5);
    expect(screen.getByRole("textbox")).toHaveValue("4,5");
  });

  it("pushes changed settings to the bridge", () => {
    const bridge = fakeBridge();
    const { rerender } = render(<NumericEdit id="qty" numericType={numericTypes.int32} value={1} bridge={bridge} />);
    expect(bridge.update).not.toHaveBeenCalled();

    rerender(<NumericEdit id="qty" numericType={numericTypes.int32} value={1} decimals={0} bridge={bridge} />);

    expect(bridge.initialize).toHaveBeenCalledTimes(1);
    expect(bridge.update).toHaveBeenCalledTimes(1);
    expect(bridge.update.mock.calls[0][2].decimals).toBe(0);
  });
});
