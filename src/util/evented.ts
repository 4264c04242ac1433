import {type Subscription} from './util';

/**
 * A listener method used as a callback to events
 */
export type Listener<E extends Event = Event> = (event: E) => void;

type Listeners = {[_: string]: Array<Listener>};

function _addEventListener(type: string, listener: Listener, listenerList: Listeners) {
    const listenerExists = listenerList[type] && listenerList[type].indexOf(listener) !== -1;
    if (!listenerExists) {
        listenerList[type] = listenerList[type] || [];
        listenerList[type].push(listener);
    }
}

function _removeEventListener(type: string, listener: Listener, listenerList: Listeners) {
    if (listenerList[type]) {
        const index = listenerList[type].indexOf(listener);
        if (index !== -1) {
            listenerList[type].splice(index, 1);
        }
    }
}

/**
 * The event class
 */
export class Event {
    readonly type: string;
    target?: Evented;

    constructor(type: string) {
        this.type = type;
    }
}

/**
 * Methods mixed in to other classes for event capabilities.
 */
export class Evented {
    _listeners: Listeners = {};
    _eventedParent?: Evented;

    /**
     * Adds a listener to a specified event type.
     *
     * @param type - The event type to add a listen for.
     * @param listener - The function to be called when the event is fired.
     * The listener function is called with the event passed to `fire`,
     * with its `target` set to this instance.
     */
    on(type: string, listener: Listener): Subscription {
        _addEventListener(type, listener, this._listeners);

        return {
            unsubscribe: () => {
                this.off(type, listener);
            }
        };
    }

    /**
     * Removes a previously registered event listener.
     *
     * @param type - The event type to remove listeners for.
     * @param listener - The listener function to remove.
     */
    off(type: string, listener: Listener) {
        _removeEventListener(type, listener, this._listeners);

        return this;
    }

    fire(event: Event) {
        const type = event.type;

        if (this.listens(type)) {
            event.target = event.target || this;

            // make sure adding or removing listeners inside other listeners won't cause an infinite loop
            const listeners = this._listeners[type] ? this._listeners[type].slice() : [];
            for (const listener of listeners) {
                listener.call(this, event);
            }

            const parent = this._eventedParent;
            if (parent) {
                parent.fire(event);
            }
        }

        return this;
    }

    /**
     * Returns a true if this instance of Evented or any forwarded instances of Evented have a listener for the specified type.
     *
     * @param type - The event type
     * @returns `true` if there is at least one registered listener for specified event type, `false` otherwise
     */
    listens(type: string): boolean {
        return (
            (this._listeners[type] !== undefined && this._listeners[type].length > 0) ||
            (this._eventedParent !== undefined && this._eventedParent.listens(type))
        );
    }

    /**
     * Bubble all events fired by this instance of Evented to this parent instance of Evented.
     */
    setEventedParent(parent?: Evented) {
        this._eventedParent = parent;

        return this;
    }
}
