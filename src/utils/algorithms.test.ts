import { countSameStartingCharacters, debounce, distinctBy } from "./algorithms";

describe("Algorithm utilities", () => {
  describe("debounce", () => {
    jest.useFakeTimers();

    it("should debounce function calls", () => {
      const mockFn = jest.fn();
      const debouncedFn = debounce(mockFn, 100);

      // Call multiple times rapidly
      debouncedFn("test1");
      debouncedFn("test2");
      debouncedFn("test3");

      // Function should not be called yet
      expect(mockFn).not.toHaveBeenCalled();

      // Fast-forward time
      jest.advanceTimersByTime(100);

      // Function should be called once with the last arguments
      expect(mockFn).toHaveBeenCalledTimes(1);
      expect(mockFn).toHaveBeenCalledWith("test3");
    });

    it("should reset timer on subsequent calls", () => {
      const mockFn = jest.fn();
      const debouncedFn = debounce(mockFn, 100);

      debouncedFn("first");
      jest.advanceTimersByTime(50);

      debouncedFn("second");
      jest.advanceTimersByTime(50);

      // Should not be called yet (timer was reset)
      expect(mockFn).not.toHaveBeenCalled();

      jest.advanceTimersByTime(50);

      // Now it should be called with the last value
      expect(mockFn).toHaveBeenCalledTimes(1);
      expect(mockFn).toHaveBeenCalledWith("second");
    });
  });

  describe("countSameStartingCharacters", () => {
    it("should count the shared literal prefix", () => {
      expect(countSameStartingCharacters("/docs/a/antora.yml", "/docs/a/modules/ROOT")).toBe(8);
      expect(countSameStartingCharacters("/docs", "/docs")).toBe(5);
      expect(countSameStartingCharacters("abc", "xyz")).toBe(0);
      expect(countSameStartingCharacters("", "abc")).toBe(0);
    });
  });

  describe("distinctBy", () => {
    it("should keep the first item for each key", () => {
      const items = [
        { key: "a", n: 1 },
        { key: "b", n: 2 },
        { key: "a", n: 3 },
      ];
      expect(distinctBy(items, (item) => item.key)).toEqual([
        { key: "a", n: 1 },
        { key: "b", n: 2 },
      ]);
    });
  });
});
