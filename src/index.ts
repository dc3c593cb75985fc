export * from "@/memory";
export { defaultMemoryConfig, loadMemoryConfig, type MemoryConfig } from "@/config";
export { getHomeDir, setHomeDir } from "@/home";
export { systemClock, type Clock } from "@/utils/clock";
