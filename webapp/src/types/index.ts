// webapp/src/types/index.ts

// --- Base Message Structure ---
interface BaseMessage {
    id: number; // Reserved
    component: string; // Source component type
}

// --- Messages Sent FROM components TO the application ---

export interface ComponentEventMessage<TPayload> extends BaseMessage {
    type: "event";
    src: string; // Source instance ID
    payload: TPayload;
}

export interface ComponentErrorMessage extends BaseMessage {
    type: "error";
    src: string;
    payload: {
        message: string;
    };
}

export type SentMessage<TPayload> =
    | ComponentEventMessage<TPayload>
    | ComponentErrorMessage;

/** Imperative handle exposed by components that draw outside React's render cycle. */
export interface ComponentHandle {
    repaint: () => void;
}
