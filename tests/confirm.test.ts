import inquirer from "inquirer";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { confirm } from "../src/cli/confirm";

vi.mock("inquirer", () => ({
  default: {
    prompt: vi.fn(),
  },
}));

describe("confirm", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    Object.defineProperty(process.stdin, "isTTY", { value: true, configurable: true });
  });

  it("approves without asking when yes is set", async () => {
    expect(await confirm("Delete?", { yes: true })).toBe(true);
    expect(inquirer.prompt).not.toHaveBeenCalled();
  });

  it("declines without asking when stdin is not a TTY", async () => {
    Object.defineProperty(process.stdin, "isTTY", { value: false, configurable: true });

    expect(await confirm("Delete?")).toBe(false);
    expect(inquirer.prompt).not.toHaveBeenCalled();
  });

  it("returns the answer from the prompt", async () => {
    vi.mocked(inquirer.prompt).mockResolvedValueOnce({ confirmed: true });

    expect(await confirm("Merge this group (keep newest)?")).toBe(true);
    expect(inquirer.prompt).toHaveBeenCalledWith([
      { type: "confirm", name: "confirmed", message: "Merge this group (keep newest)?", default: false },
    ]);
  });

  it("passes the default answer through", async () => {
    vi.mocked(inquirer.prompt).mockResolvedValueOnce({ confirmed: false });

    expect(await confirm("Add them?", { defaultValue: true })).toBe(false);
    expect(inquirer.prompt).toHaveBeenCalledWith([
      { type: "confirm", name: "confirmed", message: "Add them?", default: true },
    ]);
  });
});
