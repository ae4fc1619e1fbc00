import { ConversationContext, ConversationContextStore } from '../../../src/application/ConversationContext';

describe('ConversationContext', () => {
    it('should store and return values by key', () => {
        const context = new ConversationContext();
        const photo = Buffer.from('photo');

        context.set('photo', photo);
        context.set('aspectRatio', '4:3');

        expect(context.get('photo')).toBe(photo);
        expect(context.get('aspectRatio')).toBe('4:3');
        expect(context.has('photo')).toBe(true);
    });

    it('should start empty', () => {
        const context = new ConversationContext();

        expect(context.get('photo')).toBeUndefined();
        expect(context.has('aspectRatio')).toBe(false);
    });

    it('should forget everything on clear', () => {
        const context = new ConversationContext();
        context.set('photo', Buffer.from('photo'));

        context.clear();

        expect(context.has('photo')).toBe(false);
    });
});

describe('ConversationContextStore', () => {
    it('should return the same context for the same chat', () => {
        const store = new ConversationContextStore();

        expect(store.forChat(42)).toBe(store.forChat(42));
    });

    it('should keep chats isolated', () => {
        const store = new ConversationContextStore();
        store.forChat(1).set('photo', Buffer.from('one'));

        expect(store.forChat(2).has('photo')).toBe(false);
    });

    it('should forget a released chat', () => {
        const store = new ConversationContextStore();
        const context = store.forChat(1);
        context.set('photo', Buffer.from('one'));

        store.release(1);

        expect(context.has('photo')).toBe(false);
        expect(store.size).toBe(0);
        expect(store.forChat(1)).not.toBe(context);
    });

    describe('capacity', () => {
        beforeEach(() => {
            jest.spyOn(console, 'log').mockImplementation(() => { });
        });

        afterEach(() => {
            jest.restoreAllMocks();
        });

        it('should evict the least recently used chat when full', () => {
            const store = new ConversationContextStore(2);
            const first = store.forChat(1);
            first.set('photo', Buffer.from('one'));
            store.forChat(2).set('photo', Buffer.from('two'));

            store.forChat(3);

            expect(store.size).toBe(2);
            expect(first.has('photo')).toBe(false);
            expect(store.forChat(2).has('photo')).toBe(true);
        });

        it('should count a lookup as use', () => {
            const store = new ConversationContextStore(2);
            store.forChat(1).set('photo', Buffer.from('one'));
            store.forChat(2).set('photo', Buffer.from('two'));
            store.forChat(1);

            store.forChat(3);

            expect(store.forChat(1).has('photo')).toBe(true);
        });

        it('should reject a non-positive capacity', () => {
            expect(() => new ConversationContextStore(0)).toThrow('maxConversations must be a positive integer, got: 0');
        });
    });
});
