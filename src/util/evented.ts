import {warnOnce, type Subscription} from './util';
import {ListenerCallbackError} from './bridge_error';

/**
 * A listener method used as a callback to events
 */
export type Listener<E> = (event: E) => void;

type Listeners<M> = {[K in keyof M]?: Array<Listener<M[K]>>};

function _addEventListener<M, K extends keyof M>(type: K, listener: Listener<M[K]>, listenerList: Listeners<M>) {
    const listeners = listenerList[type] || [];
    listeners.push(listener);
    listenerList[type] = listeners;
}

function _removeEventListener<M, K extends keyof M>(type: K, listener: Listener<M[K]>, listenerList: Listeners<M>): boolean {
    const listeners = listenerList[type];
    if (listeners) {
        const index = listeners.indexOf(listener);
        if (index !== -1) {
            listeners.splice(index, 1);
            return true;
        }
    }
    return false;
}

/**
 * The event class
 */
export class Event<T extends string = string> {
    readonly type: T;

    constructor(type: T) {
        this.type = type;
    }
}

/**
 * An error event
 */
export class ErrorEvent extends Event<'error'> {
    readonly error: Error;

    constructor(error: Error) {
        super('error');
        this.error = error;
    }
}

/**
 * Base class for objects that fan events out to registered listeners.
 *
 * `M` maps every event type to the event object its listeners receive.
 * Listeners of one type are called in registration order. A listener that throws
 * is reported through {@link Evented#_reportListenerError} and does not prevent
 * the remaining listeners from being called.
 */
export class Evented<M extends {[K in keyof M]: Event}> {
    _listeners: Listeners<M> = {};
    _oneTimeListeners: Listeners<M> = {};
    _disposed = false;

    /**
     * Adds a listener to a specified event type. Adding the same listener twice
     * registers it twice.
     *
     * @param type - The event type to add a listen for.
     * @param listener - The function to be called when the event is fired.
     */
    on<K extends keyof M>(type: K, listener: Listener<M[K]>): Subscription {
        if (this._disposed) {
            warnOnce(`Ignoring listener for "${String(type)}" added after dispose.`);
        } else {
            _addEventListener(type, listener, this._listeners);
        }

        return {
            unsubscribe: () => {
                this.off(type, listener);
            }
        };
    }

    /**
     * Removes the first registration of a listener.
     *
     * @param type - The event type to remove listeners for.
     * @param listener - The listener function to remove.
     */
    off<K extends keyof M>(type: K, listener: Listener<M[K]>): this {
        if (!_removeEventListener(type, listener, this._listeners)) {
            _removeEventListener(type, listener, this._oneTimeListeners);
        }

        return this;
    }

    /**
     * Adds a listener that will be called only once to a specified event type.
     *
     * @param type - The event type to listen for.
     * @param listener - The function to be called when the event is fired the first time.
     * @returns `this` or a promise if a listener is not provided
     */
    once<K extends keyof M>(type: K, listener: Listener<M[K]>): this;
    once<K extends keyof M>(type: K): Promise<M[K]>;
    once<K extends keyof M>(type: K, listener?: Listener<M[K]>): this | Promise<M[K]> {
        if (!listener) {
            return new Promise<M[K]>((resolve) => {
                this.once(type, resolve);
            });
        }
        if (this._disposed) {
            warnOnce(`Ignoring listener for "${String(type)}" added after dispose.`);
        } else {
            _addEventListener(type, listener, this._oneTimeListeners);
        }

        return this;
    }

    fire<K extends keyof M>(type: K, event: M[K]): this {
        if (this._disposed || !this.listens(type)) return this;

        // make sure adding or removing listeners inside other listeners won't cause an infinite loop
        const listeners = (this._listeners[type] || []).slice();
        const oneTimeListeners = (this._oneTimeListeners[type] || []).slice();
        for (const listener of listeners) {
            this._invoke(type, listener, event);
        }

        for (const listener of oneTimeListeners) {
            _removeEventListener(type, listener, this._oneTimeListeners);
            this._invoke(type, listener, event);
        }

        return this;
    }

    /**
     * Returns true if this instance of Evented has a listener for the specified type.
     *
     * @param type - The event type
     */
    listens<K extends keyof M>(type: K): boolean {
        const listeners = this._listeners[type];
        const oneTimeListeners = this._oneTimeListeners[type];
        return (listeners !== undefined && listeners.length > 0) ||
            (oneTimeListeners !== undefined && oneTimeListeners.length > 0);
    }

    /**
     * Number of listeners currently registered for `type`, one-time listeners included.
     */
    listenerCount<K extends keyof M>(type: K): number {
        return (this._listeners[type] || []).length + (this._oneTimeListeners[type] || []).length;
    }

    /**
     * Removes every listener registered for `type`.
     */
    clear<K extends keyof M>(type: K): this {
        const listeners = this._listeners[type];
        if (listeners) listeners.length = 0;
        const oneTimeListeners = this._oneTimeListeners[type];
        if (oneTimeListeners) oneTimeListeners.length = 0;
        return this;
    }

    /**
     * Discards every listener. Events fired afterwards reach nobody and later
     * registrations are ignored.
     */
    dispose() {
        this._listeners = {};
        this._oneTimeListeners = {};
        this._disposed = true;
    }

    _invoke<K extends keyof M>(type: K, listener: Listener<M[K]>, event: M[K]) {
        try {
            listener.call(this, event);
        } catch (e) {
            this._reportListenerError(new ListenerCallbackError(String(type), e));
        }
    }

    /**
     * Called with every exception thrown by a listener. Subclasses may route it
     * to an error channel; it must not throw.
     */
    _reportListenerError(error: ListenerCallbackError) {
        console.error(error);
    }
}
