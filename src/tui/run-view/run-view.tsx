import { Box, Text, useApp, useInput, useStdout } from "ink";
import { useEffect, useMemo, useReducer, useState } from "react";
import type { RuntimeEvent } from "../../core/engine.js";
import { buildDiagramLines } from "./diagram.js";
import { fitText, formatDuration, formatMatrix } from "./format.js";
import { initialRunViewState, outputLines, reduceRunView } from "./state.js";
import { colorForStatus, formatStatusText, renderStatusGlyph, SPINNER_FRAMES, STATUS_LABELS } from "./status.js";
import { formatHelpText, isActive } from "./utils/help.js";
import type { RunViewMode } from "./utils/help.js";

export type RunViewProps = {
	subscribe: (listener: (event: RuntimeEvent) => void) => () => void;
	onCancel: () => void;
};

const JOB_COLUMN_WIDTH = 34;
const RESERVED_ROWS = 12;

export function RunView({ subscribe, onCancel }: RunViewProps): JSX.Element {
	const { exit } = useApp();
	const { stdout } = useStdout();
	const [state, dispatch] = useReducer(reduceRunView, initialRunViewState);
	const [viewMode, setViewMode] = useState<RunViewMode>("summary");
	const [selectedJobIndex, setSelectedJobIndex] = useState(0);
	const [quitPromptVisible, setQuitPromptVisible] = useState(false);
	const [spinnerIndex, setSpinnerIndex] = useState(0);
	const [terminalHeight, setTerminalHeight] = useState<number>(stdout.rows ?? 40);

	useEffect(() => subscribe((event) => dispatch(event)), [subscribe]);

	useEffect(() => {
		const interval = setInterval(() => {
			setSpinnerIndex((prev) => (prev + 1) % SPINNER_FRAMES.length);
		}, 140);
		return () => clearInterval(interval);
	}, []);

	useEffect(() => {
		const handleResize = (): void => setTerminalHeight(stdout.rows ?? 40);
		stdout.on("resize", handleResize);
		return () => {
			stdout.off("resize", handleResize);
		};
	}, [stdout]);

	const active = isActive(state.status);

	useEffect(() => {
		if (!active && state.result) {
			const timer = setTimeout(() => exit(), 200);
			return () => clearTimeout(timer);
		}
		return undefined;
	}, [active, exit, state.result]);

	const diagramLines = useMemo(() => buildDiagramLines(state.jobs, spinnerIndex), [state.jobs, spinnerIndex]);
	const selectedJob = state.jobs[Math.min(selectedJobIndex, Math.max(0, state.jobs.length - 1))];
	const maxLogLines = Math.max(3, terminalHeight - RESERVED_ROWS);

	useInput((input, key) => {
		if (key.ctrl && input === "c") {
			onCancel();
			return;
		}
		if (quitPromptVisible) {
			if (input === "y") {
				setQuitPromptVisible(false);
				onCancel();
			} else if (input === "n" || key.return || key.escape) {
				setQuitPromptVisible(false);
			}
			return;
		}
		if (input === "q") {
			if (active) {
				setQuitPromptVisible(true);
			} else {
				exit();
			}
			return;
		}
		if (key.tab) {
			setViewMode((prev) => (prev === "summary" ? "details" : "summary"));
			return;
		}
		if (input === "s") {
			setViewMode("summary");
			return;
		}
		if (input === "d") {
			setViewMode("details");
			return;
		}
		if (viewMode === "details" && key.upArrow) {
			setSelectedJobIndex((prev) => Math.max(0, prev - 1));
			return;
		}
		if (viewMode === "details" && key.downArrow) {
			setSelectedJobIndex((prev) => Math.min(state.jobs.length - 1, prev + 1));
		}
	});

	return (
		<Box flexDirection="column" padding={1}>
			<Box flexDirection="column" marginBottom={1}>
				<Text>
					{state.pipeline ?? "pipeline"} · {state.event ?? "event"} · {state.runId ?? "starting"}
				</Text>
				<Text color={colorForStatus(state.status)} dimColor={state.status === "pending"}>
					{formatStatusText(state.status, spinnerIndex)}
					{state.queuedFor ? ` (waiting for run ${state.queuedFor})` : ""}
				</Text>
				{state.notice ? <Text color="yellow">{state.notice}</Text> : null}
			</Box>

			{viewMode === "summary" ? (
				<Box flexDirection="column" borderStyle="round" paddingX={2} paddingY={1}>
					<Text dimColor>Summary</Text>
					{diagramLines.map((line) => (
						<Text key={line.id}>{line.text}</Text>
					))}
				</Box>
			) : (
				<Box flexDirection="row">
					<Box flexDirection="column" width={JOB_COLUMN_WIDTH}>
						<Text dimColor>Jobs</Text>
						{state.jobs.map((job) => (
							<Text
								key={job.jobId}
								color={colorForStatus(job.status)}
								backgroundColor={job === selectedJob ? "gray" : undefined}
								bold={job === selectedJob}
							>
								{fitText(`${renderStatusGlyph(job.status, spinnerIndex)} ${job.name}`, JOB_COLUMN_WIDTH - 2)}
							</Text>
						))}
					</Box>
					<Box flexDirection="column" marginLeft={1} flexGrow={1}>
						{selectedJob ? (
							<>
								<Text>{selectedJob.jobId}</Text>
								<Text dimColor>
									{STATUS_LABELS[selectedJob.status]}
									{selectedJob.durationMs !== undefined ? ` · ${formatDuration(selectedJob.durationMs)}` : ""}
									{selectedJob.matrix ? ` · ${formatMatrix(selectedJob.matrix)}` : ""}
								</Text>
								{selectedJob.reason ? <Text color="yellow">{selectedJob.reason}</Text> : null}
								{selectedJob.error ? <Text color="red">{selectedJob.error.message}</Text> : null}
								<Box flexDirection="column" marginTop={1}>
									{outputLines(selectedJob)
										.slice(-maxLogLines)
										.map((line, lineIndex) => (
											<Text key={`${selectedJob.jobId}-${lineIndex}`} dimColor>
												{line}
											</Text>
										))}
								</Box>
							</>
						) : (
							<Text dimColor>No job selected.</Text>
						)}
					</Box>
				</Box>
			)}

			<Box marginTop={1}>
				<Text dimColor>{formatHelpText({ viewMode, quitPromptVisible, status: state.status })}</Text>
			</Box>
		</Box>
	);
}
