import type { ViewStatus } from "../status.js";

export type RunViewMode = "summary" | "details";

export type HelpTextInput = {
	viewMode: RunViewMode;
	quitPromptVisible: boolean;
	status: ViewStatus;
};

export function isActive(status: ViewStatus): boolean {
	return status === "running" || status === "queued" || status === "pending";
}

export function formatHelpText({ viewMode, quitPromptVisible, status }: HelpTextInput): string {
	if (quitPromptVisible) {
		return "Y: cancel run · N/Enter/Esc: keep running";
	}
	const quit = isActive(status) ? "Q: cancel run" : "Q: exit";
	if (viewMode === "summary") {
		return `Tab: switch view · D: details · ${quit}`;
	}
	return `Up/Down: select job · Tab: switch view · S: summary · ${quit}`;
}
